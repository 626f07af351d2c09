import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { fileURLToPath } from "url";
import { loadEntryDatasetFile, parseEntryDataset } from "../data/entryDataset";
import {
  createSatisfactionEntry,
  isCalendarDay,
  findMostRecentScored,
  metricsFromRecord,
  metricsToRecord,
  selectTrainingSet,
} from "../model/SatisfactionEntries";
import { UNSCORED, scored } from "../types/suggestion.types";
import { ConfigInvalidError, DimensionMismatchError } from "../utils/SuggestionErrors";
import { enableSilentMode } from "../utils/SuggestionLogger";

const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/sample-entries.json", import.meta.url));
const METRICS = [8000, 420, 700, 30, 10, 90, 6000, 12, 65];

describe("Entry Dataset - leitura de snapshots JSON", () => {
  beforeAll(() => {
    enableSilentMode();
  });

  it("deve carregar o arquivo de fixture", async () => {
    const entries = await loadEntryDatasetFile(FIXTURE_PATH);

    expect(entries).toHaveLength(44);
    expect(entries[0]).toEqual({
      day: "2025-09-01",
      score: scored(7),
      metrics: [10451, 432, 961.5, 53, 12, 130, 7762.6, 19, 64],
    });
    expect(selectTrainingSet(entries)).toHaveLength(40);
  });

  it("deve normalizar data-hora ISO para o dia", () => {
    const [entry] = parseEntryDataset({
      entries: [{ date: "2025-11-20T08:30:00Z", satisfactionScore: 6.5, metrics: METRICS }],
    });

    expect(entry.day).toBe("2025-11-20");
  });

  it("deve tratar score ausente ou null como não avaliado", () => {
    const entries = parseEntryDataset({
      entries: [
        { date: "2025-11-20", metrics: METRICS },
        { date: "2025-11-21", satisfactionScore: null, metrics: METRICS },
      ],
    });

    expect(entries.map(e => e.score)).toEqual([UNSCORED, UNSCORED]);
  });

  it("deve manter a última ocorrência de um dia duplicado", () => {
    const entries = parseEntryDataset({
      entries: [
        { date: "2025-11-20", satisfactionScore: 3, metrics: METRICS },
        { date: "2025-11-20T22:00:00Z", satisfactionScore: 8, metrics: METRICS },
      ],
    });

    expect(entries).toHaveLength(1);
    expect(entries[0].score).toEqual(scored(8));
  });

  it("deve rejeitar vetor com número errado de métricas", () => {
    expect(() =>
      parseEntryDataset({ entries: [{ date: "2025-11-20", satisfactionScore: 5, metrics: [1, 2, 3] }] })
    ).toThrow(ConfigInvalidError);
  });

  it("deve rejeitar data com formato válido mas inexistente", () => {
    expect(() =>
      parseEntryDataset({ entries: [{ date: "2025-02-30", satisfactionScore: 5, metrics: METRICS }] })
    ).toThrow("Invalid configuration: entries.0.date - Data inexistente");
    expect(() =>
      parseEntryDataset({ entries: [{ date: "2025-13-01T08:00:00Z", satisfactionScore: 5, metrics: METRICS }] })
    ).toThrow("Invalid configuration: entries.0.date - Data inexistente");
  });

  it("deve rejeitar documento sem a lista de entradas", () => {
    expect(() => parseEntryDataset({ items: [] })).toThrow("Invalid configuration: entries - Required");
  });

  describe("Arquivos inválidos", () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(path.join(tmpdir(), "entry-dataset-"));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("deve rejeitar JSON malformado", async () => {
      const file = path.join(dir, "broken.json");
      await writeFile(file, "{ entries: ", "utf-8");

      await expect(loadEntryDatasetFile(file)).rejects.toThrow(ConfigInvalidError);
    });
  });
});

describe("SatisfactionEntries", () => {
  it("deve criar entrada avaliada e não avaliada", () => {
    expect(createSatisfactionEntry("2025-11-20", METRICS, 7).score).toEqual(scored(7));
    expect(createSatisfactionEntry("2025-11-20", METRICS).score).toEqual(UNSCORED);
  });

  it("deve copiar o vetor de métricas", () => {
    const metrics = [...METRICS];
    const entry = createSatisfactionEntry("2025-11-20", metrics, 7);
    metrics[0] = 0;

    expect(entry.metrics[0]).toBe(8000);
  });

  it("deve validar dia, dimensão e valores finitos", () => {
    expect(() => createSatisfactionEntry("20/11/2025", METRICS)).toThrow(ConfigInvalidError);
    expect(() => createSatisfactionEntry("2025-11-20", METRICS.slice(1))).toThrow(DimensionMismatchError);
    expect(() => createSatisfactionEntry("2025-11-20", [...METRICS.slice(1), Number.NaN])).toThrow(
      "Invalid configuration: restingHeartRateToday - must be a finite number, got NaN"
    );
    expect(() => createSatisfactionEntry("2025-11-20", METRICS, Number.POSITIVE_INFINITY)).toThrow(ConfigInvalidError);
  });

  it("deve aceitar apenas dias que existem no calendário", () => {
    expect(() => createSatisfactionEntry("2025-13-45", METRICS)).toThrow(
      'Invalid configuration: day - expected a calendar day as YYYY-MM-DD, got "2025-13-45"'
    );
    expect(() => createSatisfactionEntry("2025-02-29", METRICS)).toThrow(ConfigInvalidError);
    expect(createSatisfactionEntry("2024-02-29", METRICS, 6).day).toBe("2024-02-29");

    expect(isCalendarDay("2025-04-31")).toBe(false);
    expect(isCalendarDay("2025-12-31")).toBe(true);
  });

  it("deve converter entre vetor e registro nomeado", () => {
    const record = metricsToRecord(METRICS);

    expect(record.stepsToday).toBe(8000);
    expect(record.restingHeartRateToday).toBe(65);
    expect(metricsFromRecord(record)).toEqual(METRICS);
  });

  it("deve encontrar o dia avaliado mais recente", () => {
    const entries = [
      createSatisfactionEntry("2025-11-19", METRICS, 4),
      createSatisfactionEntry("2025-11-21", METRICS),
      createSatisfactionEntry("2025-11-20", METRICS, 6),
    ];

    expect(findMostRecentScored(entries)?.day).toBe("2025-11-20");
    expect(findMostRecentScored([entries[1]])).toBeUndefined();
  });
});
