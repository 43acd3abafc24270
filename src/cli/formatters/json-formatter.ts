/**
 * JSON formátter pro CLI výstup.
 */

import type { FormattableData } from '../types.js';
import type { OutputFormatter } from './index.js';

export class JsonFormatter implements OutputFormatter {
  constructor(private readonly pretty: boolean = false) {}

  format(data: FormattableData): string {
    const output = this.toOutputObject(data);
    return this.pretty ? JSON.stringify(output, null, 2) : JSON.stringify(output);
  }

  private toOutputObject(data: FormattableData): Record<string, unknown> {
    const meta = data.meta ? { meta: data.meta } : {};

    switch (data.type) {
      case 'error':
        return { success: false, error: data.data, ...meta };

      case 'message':
        return { success: true, message: data.data, ...meta };

      case 'validation':
        return { success: data.data.valid, validation: data.data, ...meta };

      case 'advice':
        return { success: true, advice: data.data, ...meta };
    }
  }
}
