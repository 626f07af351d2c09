/**
 * SuggestionErrors - Erros Estruturados do Motor de Sugestões
 *
 * Implementa:
 * - Códigos de erro padronizados por cenário
 * - Classes específicas (modelo não ajustado, dimensão, score ausente, treino vazio)
 * - Conversão para TRPCError e para resposta JSON
 *
 * POLÍTICA: componentes do motor lançam estes erros de forma síncrona para o
 * chamador direto. Nenhum componente recupera ou repete internamente.
 *
 * @version 1.0.0
 */

import { TRPCError } from "@trpc/server";
import { serviceLogger } from "./SuggestionLogger";

// ============================================================================
// ERROR CODES
// ============================================================================

export const SUGGESTION_ERROR_CODES = {
  // Erros de modelo
  UNFITTED_MODEL: "SUGGESTION_UNFITTED_MODEL",
  DIMENSION_MISMATCH: "SUGGESTION_DIMENSION_MISMATCH",

  // Erros de dados
  MISSING_SCORE: "SUGGESTION_MISSING_SCORE",
  EMPTY_TRAINING_SET: "SUGGESTION_EMPTY_TRAINING_SET",
  ENTRY_NOT_FOUND: "SUGGESTION_ENTRY_NOT_FOUND",

  // Erros de configuração
  CONFIG_INVALID: "SUGGESTION_CONFIG_INVALID",

  // Erro genérico (último recurso)
  INTERNAL_ERROR: "SUGGESTION_INTERNAL_ERROR",
} as const;

export type SuggestionErrorCode = typeof SUGGESTION_ERROR_CODES[keyof typeof SUGGESTION_ERROR_CODES];

export type ErrorDetails = Record<string, string | number | boolean | null | undefined>;

// ============================================================================
// ERROR RESPONSE INTERFACE
// ============================================================================

export interface SuggestionErrorResponse {
  success: false;
  error: {
    code: SuggestionErrorCode;
    message: string;
    details?: ErrorDetails;
    timestamp: string;
  };
}

type TrpcErrorCode = "BAD_REQUEST" | "NOT_FOUND" | "PRECONDITION_FAILED" | "INTERNAL_SERVER_ERROR";

// ============================================================================
// BASE ERROR CLASS
// ============================================================================

export class SuggestionError extends Error {
  public readonly code: SuggestionErrorCode;
  public readonly details?: ErrorDetails;
  public readonly timestamp: string;

  constructor(code: SuggestionErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "SuggestionError";
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    // Manter stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Converte para TRPCError
   */
  toTRPCError(): TRPCError {
    return new TRPCError({
      code: this.mapToTRPCCode(),
      message: this.message,
      cause: this,
    });
  }

  /**
   * Mapeia código de erro para código TRPC
   */
  private mapToTRPCCode(): TrpcErrorCode {
    switch (this.code) {
      case SUGGESTION_ERROR_CODES.DIMENSION_MISMATCH:
      case SUGGESTION_ERROR_CODES.MISSING_SCORE:
      case SUGGESTION_ERROR_CODES.CONFIG_INVALID:
        return "BAD_REQUEST";

      case SUGGESTION_ERROR_CODES.ENTRY_NOT_FOUND:
        return "NOT_FOUND";

      case SUGGESTION_ERROR_CODES.UNFITTED_MODEL:
      case SUGGESTION_ERROR_CODES.EMPTY_TRAINING_SET:
        return "PRECONDITION_FAILED";

      default:
        return "INTERNAL_SERVER_ERROR";
    }
  }

  /**
   * Converte para resposta JSON
   */
  toResponse(): SuggestionErrorResponse {
    return {
      success: false,
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp,
      },
    };
  }
}

// ============================================================================
// SPECIFIC ERRORS
// ============================================================================

export class UnfittedModelError extends SuggestionError {
  constructor(component: string) {
    super(
      SUGGESTION_ERROR_CODES.UNFITTED_MODEL,
      `${component} must be fitted before use. Call fit() first.`,
      { component }
    );
    this.name = "UnfittedModelError";
  }
}

export class DimensionMismatchError extends SuggestionError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, context?: string) {
    super(
      SUGGESTION_ERROR_CODES.DIMENSION_MISMATCH,
      `Feature dimension mismatch${context ? ` in ${context}` : ""}: expected ${expected}, got ${actual}`,
      { expected, actual, context }
    );
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class MissingScoreError extends SuggestionError {
  constructor(day: string) {
    super(
      SUGGESTION_ERROR_CODES.MISSING_SCORE,
      `Satisfaction score must be present in the starting entry (${day})`,
      { day }
    );
    this.name = "MissingScoreError";
  }
}

export class EmptyTrainingSetError extends SuggestionError {
  constructor(totalEntries: number) {
    super(
      SUGGESTION_ERROR_CODES.EMPTY_TRAINING_SET,
      `No rated entries available for training (${totalEntries} entries without a satisfaction score)`,
      { totalEntries }
    );
    this.name = "EmptyTrainingSetError";
  }
}

export class ConfigInvalidError extends SuggestionError {
  constructor(field: string, reason: string) {
    super(
      SUGGESTION_ERROR_CODES.CONFIG_INVALID,
      `Invalid configuration: ${field} - ${reason}`,
      { field, reason }
    );
    this.name = "ConfigInvalidError";
  }
}

export class EntryNotFoundError extends SuggestionError {
  constructor(day: string) {
    super(
      SUGGESTION_ERROR_CODES.ENTRY_NOT_FOUND,
      `No entry recorded for ${day}`,
      { day }
    );
    this.name = "EntryNotFoundError";
  }
}

// ============================================================================
// ERROR HANDLER
// ============================================================================

/**
 * Handler centralizado de erros para a camada tRPC
 */
export function handleSuggestionError(error: unknown, context?: string): never {
  if (error instanceof SuggestionError) {
    serviceLogger.error(error.message, error, context);
    throw error.toTRPCError();
  }

  if (error instanceof TRPCError) {
    serviceLogger.error(error.message, error, context);
    throw error;
  }

  // Erro genérico - wrap em SuggestionError
  const message = error instanceof Error ? error.message : String(error);
  const wrapped = new SuggestionError(SUGGESTION_ERROR_CODES.INTERNAL_ERROR, message, {
    originalError: message,
  });

  serviceLogger.error(message, error instanceof Error ? error : undefined, context);
  throw wrapped.toTRPCError();
}
