import { PipelineError } from './errors.js';
import type { StageRecords } from './types.js';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Write-once, namespace-keyed record store shared by the stages of one run.
 *
 * `put` commits a frozen copy, so what later stages read is exactly what was
 * written. A namespace can be written once; reading one that was never
 * written fails with `MissingNamespace`.
 */
export class SharedStateStore<M extends object = StageRecords> {
  private readonly records: Partial<M> = {};

  put<K extends keyof M>(namespace: K, record: M[K]): void {
    if (this.has(namespace)) {
      throw new PipelineError('DuplicateNamespace', `namespace "${String(namespace)}" already written`);
    }
    this.records[namespace] = deepFreeze(structuredClone(record));
  }

  get<K extends keyof M>(namespace: K): M[K] {
    const record: M[K] | undefined = this.records[namespace];
    if (record === undefined) {
      throw new PipelineError('MissingNamespace', `namespace "${String(namespace)}" has not been written`);
    }
    return record;
  }

  has(namespace: keyof M): boolean {
    return Object.prototype.hasOwnProperty.call(this.records, namespace);
  }

  all(): Readonly<Partial<M>> {
    return Object.freeze({ ...this.records });
  }
}
