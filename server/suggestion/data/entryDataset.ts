/**
 * Entry Dataset - Leitura de Snapshots de Entradas em JSON
 *
 * Formato:
 * {
 *   "entries": [
 *     { "date": "2025-11-20", "satisfactionScore": 7.5, "metrics": [9 números] }
 *   ]
 * }
 *
 * - `date` aceita dia (YYYY-MM-DD) ou data-hora ISO; é normalizado para o dia
 * - `satisfactionScore` ausente ou null significa "ainda não avaliado"
 * - dias duplicados: vale a última ocorrência (um registro por dia)
 *
 * @version 1.0.0
 */

import * as fs from "fs/promises";
import { z } from "zod";
import { METRIC_COUNT, type SatisfactionEntry } from "../types/suggestion.types";
import { createSatisfactionEntry, isCalendarDay } from "../model/SatisfactionEntries";
import { ConfigInvalidError } from "../utils/SuggestionErrors";
import { serviceLogger } from "../utils/SuggestionLogger";

// ============================================================================
// SCHEMAS
// ============================================================================

const ISO_DAY = /^(\d{4}-\d{2}-\d{2})(?:T.*)?$/;

export const datasetEntrySchema = z.object({
  date: z
    .string()
    .regex(ISO_DAY, "Data deve ser YYYY-MM-DD ou ISO 8601")
    .refine(value => isCalendarDay(value.slice(0, 10)), "Data inexistente"),
  satisfactionScore: z.number().finite().nullable().optional(),
  metrics: z.array(z.number().finite()).length(METRIC_COUNT, `Esperadas ${METRIC_COUNT} métricas`),
});

export const entryDatasetSchema = z.object({
  entries: z.array(datasetEntrySchema),
});

export type DatasetEntry = z.infer<typeof datasetEntrySchema>;
export type EntryDataset = z.infer<typeof entryDatasetSchema>;

// ============================================================================
// PARSING
// ============================================================================

function toDay(date: string): string {
  const match = ISO_DAY.exec(date);
  if (!match) {
    throw new ConfigInvalidError("date", `expected an ISO date, got "${date}"`);
  }
  return match[1];
}

/**
 * Converte um dataset já decodificado em entradas, um registro por dia
 */
export function parseEntryDataset(input: unknown): SatisfactionEntry[] {
  const parsed = entryDatasetSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigInvalidError(issue.path.join(".") || "dataset", issue.message);
  }

  const byDay = new Map<string, SatisfactionEntry>();

  for (const raw of parsed.data.entries) {
    const day = toDay(raw.date);
    const score = raw.satisfactionScore ?? undefined;
    byDay.set(day, createSatisfactionEntry(day, raw.metrics, score));
  }

  const duplicates = parsed.data.entries.length - byDay.size;
  if (duplicates > 0) {
    serviceLogger.warn(`${duplicates} entradas com dia duplicado substituídas pela última ocorrência`, "EntryDataset");
  }

  return [...byDay.values()];
}

/**
 * Lê e converte um arquivo JSON de entradas
 */
export async function loadEntryDatasetFile(filePath: string): Promise<SatisfactionEntry[]> {
  const text = await fs.readFile(filePath, "utf-8");

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigInvalidError(filePath, `invalid JSON: ${reason}`);
  }

  const entries = parseEntryDataset(json);
  serviceLogger.info(`${entries.length} entradas carregadas de ${filePath}`, "EntryDataset");
  return entries;
}
