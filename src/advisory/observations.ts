import type { AttributeValue, ObservationInput } from '../types/fact.js';
import { PEST_FLAGS, SYMPTOM_FLAGS, type AdvisoryInput } from './types.js';

function flags(names: readonly string[], values: Readonly<Record<string, boolean | undefined>>): Record<string, AttributeValue> {
  const result: Record<string, AttributeValue> = {};
  for (const name of names) {
    result[name] = values[name] ?? false;
  }
  return result;
}

/**
 * Převede strukturované pozorování na fakty v pevném pořadí:
 * crop, soil, lab, symptoms, weather, pests.
 */
export function toObservations(input: AdvisoryInput): ObservationInput[] {
  const observations: ObservationInput[] = [];

  if (input.crop) {
    observations.push({ kind: 'crop', attributes: { name: input.crop.name, stage: input.crop.stage } });
  }

  if (input.soil) {
    const { type, moisture, ph } = input.soil;
    observations.push({ kind: 'soil', attributes: { type, moisture, ph } });
  }

  if (input.lab) {
    const { n, p, k, ph } = input.lab;
    observations.push({
      kind: 'lab',
      attributes: { n, p, k, ...(ph !== undefined && { ph }) }
    });
  }

  if (input.symptoms) {
    observations.push({ kind: 'symptoms', attributes: flags(SYMPTOM_FLAGS, input.symptoms) });
  }

  if (input.weather) {
    const { temp, humidity, recentRainDays } = input.weather;
    observations.push({ kind: 'weather', attributes: { temp, humidity, recentRainDays } });
  }

  if (input.pests) {
    observations.push({ kind: 'pests', attributes: flags(PEST_FLAGS, input.pests) });
  }

  return observations;
}
