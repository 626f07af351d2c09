/**
 * SeededRNG - Fonte de Aleatoriedade Injetável
 *
 * Toda decisão aleatória do otimizador (dimensão perturbada, tamanho do passo,
 * sorteio de aceitação, ponto de restart) passa por um RandomSource. Em testes
 * usa-se um seed fixo; em produção, seedFromTimestamp().
 *
 * Algoritmos: Mulberry32 (padrão) e xorshift128+.
 *
 * @version 1.0.0
 */

// ============================================================================
// TYPES
// ============================================================================

/**
 * Gerador base de números em [0, 1)
 */
export interface IRNG {
  random(): number;
  getSeed(): number;
  reset(): void;
}

export type RNGAlgorithm = "mulberry32" | "xorshift128";

export interface RNGConfig {
  seed: number;
  algorithm?: RNGAlgorithm;
}

/**
 * Contrato consumido pelo otimizador
 */
export interface RandomSource {
  /** Número em [0, 1) */
  random(): number;
  /** Inteiro entre min e max (inclusive) */
  randomInt(min: number, max: number): number;
  /** Float em [min, max) */
  randomFloat(min: number, max: number): number;
  /** Elemento uniforme de um array não vazio */
  randomChoice<T>(items: readonly T[]): T;
  getSeed(): number;
}

// ============================================================================
// MULBERRY32 IMPLEMENTATION
// ============================================================================

/**
 * Mulberry32 - período 2^32, rápido, boa distribuição
 */
export class Mulberry32RNG implements IRNG {
  private readonly initialSeed: number;
  private state: number;

  constructor(seed: number) {
    this.initialSeed = seed >>> 0; // Garantir unsigned 32-bit
    this.state = this.initialSeed;
  }

  random(): number {
    this.state = (this.state + 0x6D2B79F5) | 0; // mantém o estado em 32 bits
    let t = this.state;
    t = Math.imul(t ^ t >>> 15, t | 1);
    t ^= t + Math.imul(t ^ t >>> 7, t | 61);
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  }

  getSeed(): number {
    return this.initialSeed;
  }

  reset(): void {
    this.state = this.initialSeed;
  }
}

// ============================================================================
// XORSHIFT128+ IMPLEMENTATION
// ============================================================================

/**
 * xorshift128+ (variante de 32 bits)
 */
export class XorShift128PlusRNG implements IRNG {
  private readonly initialSeed: number;
  private state0: number;
  private state1: number;

  constructor(seed: number) {
    this.initialSeed = seed >>> 0;
    this.state0 = this.initialSeed;
    this.state1 = this.initialSeed ^ 0x5DEECE66D;
  }

  random(): number {
    let s1 = this.state0;
    const s0 = this.state1;

    this.state0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this.state1 = s1;

    return ((this.state0 + this.state1) >>> 0) / 4294967296;
  }

  getSeed(): number {
    return this.initialSeed;
  }

  reset(): void {
    this.state0 = this.initialSeed;
    this.state1 = this.initialSeed ^ 0x5DEECE66D;
  }
}

// ============================================================================
// SEEDED RNG WRAPPER
// ============================================================================

export class SeededRNG implements RandomSource {
  private readonly rng: IRNG;
  private readonly seed: number;

  constructor(config: RNGConfig) {
    this.seed = config.seed;

    switch (config.algorithm) {
      case "xorshift128":
        this.rng = new XorShift128PlusRNG(config.seed);
        break;
      case "mulberry32":
      default:
        this.rng = new Mulberry32RNG(config.seed);
    }
  }

  getSeed(): number {
    return this.seed;
  }

  random(): number {
    return this.rng.random();
  }

  randomInt(min: number, max: number): number {
    return Math.floor(this.rng.random() * (max - min + 1)) + min;
  }

  randomFloat(min: number, max: number): number {
    return this.rng.random() * (max - min) + min;
  }

  randomChoice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot choose from an empty array");
    }
    const index = Math.floor(this.rng.random() * items.length);
    return items[index];
  }

  /**
   * Resetar para o estado inicial do seed
   */
  reset(): void {
    this.rng.reset();
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createSeededRNG(seed: number, algorithm?: RNGAlgorithm): SeededRNG {
  return new SeededRNG({ seed, algorithm });
}

/**
 * Criar seed a partir de string (hash)
 */
export function seedFromString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash = hash & hash; // Convert to 32bit integer
  }
  return Math.abs(hash);
}

/**
 * Criar seed a partir de timestamp (fonte não determinística de produção)
 */
export function seedFromTimestamp(): number {
  return Date.now() % 2147483647;
}
