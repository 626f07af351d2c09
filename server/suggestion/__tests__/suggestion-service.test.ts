/**
 * Teste de Integração - SuggestionService
 *
 * Repositório em memória com o snapshot de fixture; nenhuma persistência real.
 */

import { describe, it, expect, beforeAll, vi } from "vitest";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { SuggestionService } from "../service/SuggestionService";
import { InMemoryEntryRepository, type EntryRepository } from "../service/EntryRepository";
import { computeMetricDeltas } from "../service/metricDeltas";
import { parseEntryDataset } from "../data/entryDataset";
import { createSatisfactionEntry } from "../model/SatisfactionEntries";
import type { SatisfactionEntry } from "../types/suggestion.types";
import { createSeededRNG } from "../utils/SeededRNG";
import { DimensionMismatchError, SUGGESTION_ERROR_CODES, UnfittedModelError } from "../utils/SuggestionErrors";
import { enableSilentMode } from "../utils/SuggestionLogger";

const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/sample-entries.json", import.meta.url));

const LOW_DAY = createSatisfactionEntry("2025-10-20", [5000, 400, 520, 20, 7, 50, 4200, 8, 75], 5);

describe("SuggestionService", () => {
  let entries: SatisfactionEntry[];

  beforeAll(() => {
    enableSilentMode();
    entries = parseEntryDataset(JSON.parse(readFileSync(FIXTURE_PATH, "utf-8")));
  });

  describe("Sugestão disponível", () => {
    it("deve sugerir métricas melhores para um dia de baixa satisfação", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository([...entries, LOW_DAY]));
      const outcome = await service.suggest({ day: "2025-10-20", seed: 42 });

      expect(outcome.status).toBe("AVAILABLE");
      if (outcome.status !== "AVAILABLE") return;

      const { suggestion } = outcome;
      expect(suggestion.current).toEqual(LOW_DAY);
      expect(suggestion.initialValue).toBe(5);
      expect(suggestion.bestValue).toBeGreaterThan(5);
      expect(suggestion.improvement).toBe(suggestion.bestValue - 5);
      expect(suggestion.trainingSize).toBe(41);
      expect(suggestion.seed).toBe(42);
      expect(suggestion.best.day).toBe("2025-10-20");
    });

    it("deve calcular deltas por métrica entre o dia atual e a sugestão", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository([...entries, LOW_DAY]));
      const outcome = await service.suggest({ day: "2025-10-20", seed: 42 });
      if (outcome.status !== "AVAILABLE") throw new Error(`unexpected ${outcome.status}`);

      const { deltas, current, best } = outcome.suggestion;
      expect(deltas.map(d => d.key)).toEqual([
        "stepsToday",
        "timeInBedLastNight",
        "activeEnergyToday",
        "exerciseMinutesToday",
        "standHoursToday",
        "daylightTimeToday",
        "distanceWalkingToday",
        "flightsClimbedToday",
        "restingHeartRateToday",
      ]);
      deltas.forEach((delta, i) => {
        expect(delta.delta).toBe(best.metrics[i] - current.metrics[i]);
        expect(delta.magnitude).toBe(Math.abs(Math.trunc(delta.delta)));
      });

      // 5000 passos está abaixo do menor valor observado (5551); todo candidato sobe para o limite
      expect(deltas[0].direction).toBe("INCREASE");
      expect(deltas[0].magnitude).toBeGreaterThanOrEqual(551);
    });

    it("deve partir do dia avaliado mais recente quando o dia não é informado", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository(entries));
      const outcome = await service.suggest({ seed: 42, config: { maxIterations: 200 } });
      if (outcome.status !== "AVAILABLE") throw new Error(`unexpected ${outcome.status}`);

      // 2025-10-10 tem score 9.5, o máximo do treino: nenhum candidato o supera
      expect(outcome.suggestion.current.day).toBe("2025-10-10");
      expect(outcome.suggestion.bestValue).toBe(9.5);
      expect(outcome.suggestion.improvement).toBe(0);
      expect(outcome.suggestion.deltas.every(d => d.direction === "UNCHANGED" && d.magnitude === 0)).toBe(true);
    });

    it("deve ser reproduzível com o mesmo seed", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository([...entries, LOW_DAY]), {
        config: { maxIterations: 300 },
      });

      const a = await service.suggest({ day: "2025-10-20", seed: 7 });
      const b = await service.suggest({ day: "2025-10-20", seed: 7 });

      expect(b).toEqual(a);
    });

    it("deve criar a fonte de aleatoriedade com o seed pedido", async () => {
      const factory = vi.fn((seed: number) => createSeededRNG(seed));
      const service = new SuggestionService(new InMemoryEntryRepository(entries), {
        config: { maxIterations: 10 },
        createRandomSource: factory,
      });

      await service.suggest({ seed: 314 });

      expect(factory).toHaveBeenCalledWith(314);
    });

    it("deve sugerir para dia não avaliado com objetivo PREDICTED_SCORE", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository(entries));
      const outcome = await service.suggest({
        day: "2025-10-11",
        seed: 42,
        config: { objective: "PREDICTED_SCORE", maxIterations: 200 },
      });

      expect(outcome.status).toBe("AVAILABLE");
    });
  });

  describe("Sugestão indisponível", () => {
    it("deve indicar treino vazio com repositório vazio", async () => {
      const outcome = await new SuggestionService(new InMemoryEntryRepository()).suggest();

      expect(outcome).toEqual({
        status: "UNAVAILABLE",
        code: SUGGESTION_ERROR_CODES.EMPTY_TRAINING_SET,
        message: "No rated entries available for training (0 entries without a satisfaction score)",
      });
    });

    it("deve indicar treino vazio quando nenhum dia foi avaliado", async () => {
      const unrated = entries.slice(40);
      const outcome = await new SuggestionService(new InMemoryEntryRepository(unrated)).suggest();

      expect(outcome.status).toBe("UNAVAILABLE");
      if (outcome.status === "UNAVAILABLE") {
        expect(outcome.code).toBe(SUGGESTION_ERROR_CODES.EMPTY_TRAINING_SET);
      }
    });

    it("deve indicar dia inexistente", async () => {
      const outcome = await new SuggestionService(new InMemoryEntryRepository(entries)).suggest({ day: "2030-01-01" });

      expect(outcome).toEqual({
        status: "UNAVAILABLE",
        code: SUGGESTION_ERROR_CODES.ENTRY_NOT_FOUND,
        message: "No entry recorded for 2030-01-01",
      });
    });

    it("deve indicar score ausente para dia não avaliado com objetivo padrão", async () => {
      const outcome = await new SuggestionService(new InMemoryEntryRepository(entries)).suggest({ day: "2025-10-11" });

      expect(outcome.status).toBe("UNAVAILABLE");
      if (outcome.status === "UNAVAILABLE") {
        expect(outcome.code).toBe(SUGGESTION_ERROR_CODES.MISSING_SCORE);
      }
    });

    it("deve indicar configuração inválida na requisição", async () => {
      const outcome = await new SuggestionService(new InMemoryEntryRepository(entries)).suggest({
        config: { coolingRate: 2 },
      });

      expect(outcome.status).toBe("UNAVAILABLE");
      if (outcome.status === "UNAVAILABLE") {
        expect(outcome.code).toBe(SUGGESTION_ERROR_CODES.CONFIG_INVALID);
      }
    });

    it("deve propagar falhas que não são do domínio", async () => {
      const failing: EntryRepository = {
        listEntries: () => Promise.reject(new Error("storage offline")),
        findByDay: () => Promise.resolve(null),
      };

      await expect(new SuggestionService(failing).suggest()).rejects.toThrow("storage offline");
    });
  });

  describe("Predição", () => {
    it("deve prever o score de um vetor igual a um dia de treino", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository(entries));
      expect(await service.predict(entries[0].metrics)).toBeCloseTo(7, 5);
    });

    it("deve rejeitar vetor de dimensão errada", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository(entries));
      await expect(service.predict([1, 2, 3])).rejects.toThrow(DimensionMismatchError);
    });

    it("deve prever sem criar fonte de aleatoriedade", async () => {
      const factory = vi.fn((seed: number) => createSeededRNG(seed));
      const service = new SuggestionService(new InMemoryEntryRepository(entries), { createRandomSource: factory });

      await service.predict(entries[0].metrics);

      expect(factory).not.toHaveBeenCalled();
    });

    it("deve lançar UnfittedModelError sem dias avaliados", async () => {
      const service = new SuggestionService(new InMemoryEntryRepository([]));
      await expect(service.predict(entries[0].metrics)).rejects.toThrow(UnfittedModelError);
    });
  });
});

describe("computeMetricDeltas", () => {
  const current = [8000, 420, 700, 30, 10, 90, 6000, 12, 65];

  it("deve truncar o delta exibido e definir a direção", () => {
    const suggested = [9500.9, 420.6, 697.3, 30, 10, 90, 6000, 12, 65];
    const [steps, bed, energy, exercise] = computeMetricDeltas(current, suggested);

    expect(steps).toMatchObject({ key: "stepsToday", unit: "steps", magnitude: 1500, direction: "INCREASE" });
    expect(steps.delta).toBeCloseTo(1500.9, 6);
    expect(bed).toMatchObject({ magnitude: 0, direction: "UNCHANGED" });
    expect(energy).toMatchObject({ magnitude: 2, direction: "DECREASE", current: 700, suggested: 697.3 });
    expect(exercise).toMatchObject({ delta: 0, magnitude: 0, direction: "UNCHANGED" });
  });

  it("deve rejeitar vetores de dimensão errada", () => {
    expect(() => computeMetricDeltas(current, [1, 2])).toThrow(DimensionMismatchError);
  });
});
