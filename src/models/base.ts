/**
 * Base Model
 *
 * Every model wraps one JSON record from the API. Documented keys get typed
 * getters on the subclasses; any other key of the record is reachable through
 * `get()`:
 *
 * @example
 * ```typescript
 * const project = await sentry.project('acme', 'backend')
 * project.slug                 // typed getter
 * project.get('isBookmarked')  // raw access, unknown
 * ```
 */

import { MissingAttributeError, toSentryError } from '../client/errors.js'
import type { Transceiver } from '../client/transceiver.js'
import type { Parser } from '../client/types.js'
import type { Sentry } from '../sentry.js'

export abstract class BaseModel<T extends Record<string, unknown>> {
  /** Root client the model issues follow-up requests through */
  readonly sentry: Sentry
  private record: T

  constructor(sentry: Sentry, json: T) {
    this.sentry = sentry
    this.record = json
  }

  /** Raw record as last returned by the API */
  get json(): T {
    return this.record
  }

  protected get transceiver(): Transceiver {
    return this.sentry.transceiver
  }

  /**
   * Lay reported changes over the current record. Keys the changes omit keep
   * their value; the merged record must still pass `parse`.
   */
  protected merge(changes: Record<string, unknown>, parse: Parser<T>): void {
    try {
      this.record = parse({ ...this.record, ...changes })
    } catch (error) {
      throw toSentryError(error)
    }
  }

  get<K extends keyof T & string>(key: K): T[K]
  get(key: string): unknown
  get(key: string): unknown {
    const record: Record<string, unknown> = this.record
    if (!Object.hasOwn(record, key)) {
      throw new MissingAttributeError(this.constructor.name, key)
    }
    return record[key]
  }

  /** Whether the record itself carries `key`; inherited properties do not count */
  has(key: string): boolean {
    return Object.hasOwn(this.record, key)
  }

  toJSON(): T {
    return this.record
  }
}
