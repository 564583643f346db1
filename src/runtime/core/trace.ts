/**
 * Trace Log
 *
 * Ordered (label, value) pairs appended by trace(). Owned by the caller
 * and handed to the context, so the side channel is visible in the API.
 */

import type { FhirPathValue } from './values.js';

export interface TraceEntry {
  readonly label: string;
  readonly value: FhirPathValue;
}

export class TraceLog {
  private readonly items: TraceEntry[] = [];

  append(label: string, value: FhirPathValue): void {
    this.items.push({ label, value });
  }

  get entries(): readonly TraceEntry[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items.length = 0;
  }
}
