import { describe, it, expect, beforeAll } from 'vitest';
import { advise, loadDefaultRuleLibrary } from '../../src/advisory/advise.js';
import type { AdvisoryInput } from '../../src/advisory/types.js';
import type { RuleLibrary } from '../../src/core/rule-library.js';
import { SessionAbortedError } from '../../src/core/errors.js';

const mildewTomato: AdvisoryInput = {
  crop: { name: 'tomato', stage: 'flowering' },
  soil: { type: 'loam', moisture: 'adequate', ph: 6.3 },
  lab: { n: 30, p: 40, k: 45, ph: 6.3 },
  symptoms: { leafSpots: true, powderyWhite: true },
  weather: { temp: 22, humidity: 85, recentRainDays: 5 },
  pests: {}
};

describe('crop advisory', () => {
  let library: RuleLibrary;

  beforeAll(async () => {
    library = await loadDefaultRuleLibrary();
  });

  it('diagnoses powdery mildew and recommends fertilizer for low NPK', async () => {
    const result = await advise(mildewTomato, { library });

    expect(result.conclusions.map((c) => c.id)).toEqual([7, 8, 12, 13, 14, 15]);
    expect(result.diagnoses).toEqual([
      {
        id: 7,
        kind: 'diagnosis',
        attributes: { disease: 'Powdery Mildew', confidence: 0.8, notes: 'Look for white powder on leaf surfaces' }
      }
    ]);
    expect(result.recommendations.map((c) => c.attributes)).toEqual([
      {
        treatment:
          'Apply fungicide targeting powdery mildew; improve air circulation; remove heavily infected leaves'
      },
      { fertilizer: 'Apply nitrogen fertilizer (e.g., Urea or CAN) - consider split dosing' },
      { fertilizer: 'Apply phosphorus fertilizer (e.g., Single Super Phosphate) at planting or as recommended' },
      { fertilizer: 'Apply potassium fertilizer (e.g., MOP) to boost fruiting/stress tolerance' },
      { stageAdvice: 'Increase potassium to support flowering/fruition', crop: 'tomato' }
    ]);
  });

  it('gives identical results for identical input', async () => {
    const first = await advise(mildewTomato, { library });
    const second = await advise(mildewTomato, { library });

    expect(second).toEqual(first);
  });

  it('falls back to a general recommendation without data', async () => {
    const result = await advise({}, { library });

    expect(result.diagnoses).toEqual([]);
    expect(result.recommendations).toEqual([
      {
        id: 1,
        kind: 'recommendation',
        attributes: {
          general:
            'Insufficient symptom/lab data to provide a targeted recommendation. Collect more info: detailed symptoms, lab NPK, recent weather.'
        }
      }
    ]);
  });

  it('warns once about vectors even when both are present', async () => {
    const result = await advise({ pests: { aphids: true, whiteflies: true } }, { library });

    expect(result.conclusions.map((c) => [c.id, c.kind])).toEqual([
      [2, 'recommendation'],
      [3, 'diagnosis']
    ]);
    expect(result.diagnoses[0]?.attributes).toEqual({
      disease: 'High vector presence - risk of viral spread',
      confidence: 0.7
    });
  });

  it('adds stage advice for vegetative crops low in nitrogen', async () => {
    const result = await advise(
      { crop: { name: 'maize', stage: 'vegetative' }, lab: { n: 20, p: 60, k: 70 } },
      { library }
    );

    expect(result.recommendations).toEqual([
      {
        id: 4,
        kind: 'recommendation',
        attributes: { fertilizer: 'Apply nitrogen fertilizer (e.g., Urea or CAN) - consider split dosing' }
      },
      {
        id: 5,
        kind: 'recommendation',
        attributes: { stageAdvice: 'Increase nitrogen to support vegetative growth (split applications)', crop: 'maize' }
      }
    ]);
  });

  it('reports adequate NPK and soil pH problems', async () => {
    const result = await advise(
      { soil: { type: 'chalk', moisture: 'dry', ph: 8.1 }, lab: { n: 60, p: 55, k: 80 } },
      { library }
    );

    expect(result.recommendations.map((c) => c.attributes)).toEqual([
      { soilPhNote: 'Soil is alkaline (pH=8.10). Consider sulfur or acidifying amendments.' },
      { fertilizer: 'Soil NPK levels are adequate; maintain balanced fertilization and monitor' }
    ]);
  });

  it('diagnoses blight only in humid weather', async () => {
    const symptoms = { leafSpots: true, stemLesions: true };
    const humid = await advise({ symptoms, weather: { temp: 25, humidity: 90, recentRainDays: 3 } }, { library });
    const dry = await advise({ symptoms, weather: { temp: 25, humidity: 40, recentRainDays: 0 } }, { library });

    expect(humid.diagnoses.map((c) => c.attributes['disease'])).toEqual([
      'Blight-like infection (possible bacterial/fungal)'
    ]);
    expect(dry.diagnoses).toEqual([]);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(advise(mildewTomato, { library, signal: controller.signal })).rejects.toThrow(SessionAbortedError);
  });
});
