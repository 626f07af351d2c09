/**
 * SuggestionLogger - Logging do Motor de Sugestões
 *
 * Implementa:
 * - Níveis de log configuráveis (debug, info, warn, error)
 * - Logs de progresso em loops (apenas a cada N iterações)
 * - Banners de início/fim de operação
 *
 * O loop de annealing roda milhares de iterações; logs por iteração são
 * proibidos, use progress().
 *
 * @version 1.0.0
 */

// ============================================================================
// TYPES
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerConfig {
  /** Nível mínimo de log a ser exibido */
  level: LogLevel;
  /** Prefixo para todas as mensagens */
  prefix: string;
  /** Habilitar logs de progresso em loops */
  enableProgressLogs: boolean;
  /** Intervalo para logs de progresso (número de iterações) */
  progressLogInterval: number;
}

export type LogDetails = Record<string, string | number | boolean>;

// ============================================================================
// DEFAULT CONFIG
// ============================================================================

// Níveis de log ordenados por prioridade
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: resolveLogLevel(process.env.LOG_LEVEL),
  prefix: "[Suggestion]",
  enableProgressLogs: true,
  progressLogInterval: 500,
};

// ============================================================================
// LOGGER CLASS
// ============================================================================

export class SuggestionLogger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Verifica se o nível de log deve ser exibido
   */
  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  private formatMessage(message: string, context?: string): string {
    const timestamp = new Date().toISOString().split("T")[1].slice(0, 12);
    const contextStr = context ? ` [${context}]` : "";
    return `${timestamp} ${this.config.prefix}${contextStr} ${message}`;
  }

  debug(message: string, context?: string): void {
    if (this.shouldLog("debug")) {
      console.log(this.formatMessage(message, context));
    }
  }

  info(message: string, context?: string): void {
    if (this.shouldLog("info")) {
      console.log(this.formatMessage(message, context));
    }
  }

  warn(message: string, context?: string): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage(`⚠️ ${message}`, context));
    }
  }

  error(message: string, error?: Error, context?: string): void {
    if (this.shouldLog("error")) {
      const errorDetails = error && error.message !== message ? `: ${error.message}` : "";
      console.error(this.formatMessage(`❌ ${message}${errorDetails}`, context));
    }
  }

  /**
   * Log de progresso - exibe apenas a cada N iterações ou no final
   */
  progress(current: number, total: number, message: string, context?: string): void {
    if (!this.config.enableProgressLogs) return;
    if (!this.shouldLog("debug")) return;

    if (current % this.config.progressLogInterval === 0 || current === total) {
      const percent = total > 0 ? ((current / total) * 100).toFixed(1) : "100.0";
      this.debug(`${message} [${current}/${total}] (${percent}%)`, context);
    }
  }

  /**
   * Log de início de operação
   */
  startOperation(operation: string, details?: LogDetails): void {
    this.info(`🚀 ${operation}${formatDetails(details)}`);
  }

  /**
   * Log de fim de operação
   */
  endOperation(operation: string, success: boolean, details?: LogDetails): void {
    const status = success ? "✅ CONCLUÍDO" : "❌ FALHOU";
    const line = `${status}: ${operation}${formatDetails(details)}`;
    if (success) {
      this.info(line);
    } else {
      this.warn(line);
    }
  }

  setConfig(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

function formatDetails(details?: LogDetails): string {
  if (!details) return "";
  return ` | ${Object.entries(details).map(([k, v]) => `${k}: ${v}`).join(", ")}`;
}

// ============================================================================
// SINGLETON INSTANCES
// ============================================================================

/** Logger para scaler e regressor */
export const modelLogger = new SuggestionLogger({
  prefix: "[Model]",
});

/** Logger para o otimizador (annealing) */
export const optimizerLogger = new SuggestionLogger({
  prefix: "[Annealing]",
  progressLogInterval: 500,
});

/** Logger para serviço e router */
export const serviceLogger = new SuggestionLogger({
  prefix: "[Suggestion]",
});

const ALL_LOGGERS = [modelLogger, optimizerLogger, serviceLogger];

/**
 * Configura o nível de log global para todos os loggers
 */
export function setGlobalLogLevel(level: LogLevel): void {
  for (const logger of ALL_LOGGERS) {
    logger.setConfig({ level });
  }
}

/**
 * Habilita modo silencioso (apenas erros, sem progresso)
 */
export function enableSilentMode(): void {
  for (const logger of ALL_LOGGERS) {
    logger.setConfig({ level: "error", enableProgressLogs: false });
  }
}
