import { randomUUID } from 'node:crypto';

/** Vygeneruje unikátní identifikátor (UUID v4). */
export function generateId(): string {
  return randomUUID();
}

