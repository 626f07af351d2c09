/**
 * Fronteira com a camada de persistência de entradas diárias.
 * O motor apenas lê; nunca grava de volta.
 */

import type { SatisfactionEntry } from "../types/suggestion.types";

export interface EntryRepository {
  /** Snapshot de todas as entradas (avaliadas ou não) */
  listEntries(): Promise<SatisfactionEntry[]>;
  findByDay(day: string): Promise<SatisfactionEntry | null>;
}

/**
 * Repositório em memória, um registro por dia
 */
export class InMemoryEntryRepository implements EntryRepository {
  private readonly entries = new Map<string, SatisfactionEntry>();

  constructor(entries: readonly SatisfactionEntry[] = []) {
    for (const entry of entries) {
      this.upsert(entry);
    }
  }

  upsert(entry: SatisfactionEntry): void {
    this.entries.set(entry.day, entry);
  }

  async listEntries(): Promise<SatisfactionEntry[]> {
    return [...this.entries.values()].sort((a, b) => a.day.localeCompare(b.day));
  }

  async findByDay(day: string): Promise<SatisfactionEntry | null> {
    return this.entries.get(day) ?? null;
  }
}
