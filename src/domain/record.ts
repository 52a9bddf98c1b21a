import type { JsonValue } from './json.js';
import { tryParseJson } from './json.js';

/** The field whose parsed view becomes the record's structured payload. */
export const PAYLOAD_FIELD = 'msg';

/**
 * Field names a rule may target. `msg` is always present; the syslog
 * header fields are present when the inbound line carried them.
 */
export const FIELD_NAMES = [
  'msg',
  'hostname',
  'appname',
  'procid',
  'msgid',
  'facility',
  'severity',
  'timestamp',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export type RecordFields = { readonly msg: string } & Readonly<Partial<Record<FieldName, string>>>;

/**
 * A single inbound log record and its per-record evaluation state.
 *
 * Owned by exactly one processing chain for its whole life: created per
 * inbound line, evaluated once, converted to an envelope, then discarded.
 * The parse cache lives and dies with the record; nothing is shared.
 */
export class LogRecord {
  readonly raw: Buffer;
  private readonly values: ReadonlyMap<string, string>;
  private readonly parsed = new Map<string, JsonValue | undefined>();

  /** Structured payload produced by a merge; unset until one runs. */
  structured: JsonValue | undefined = undefined;
  /** Set by a forward action; the default topic applies otherwise. */
  destinationTopic: string | undefined = undefined;
  /** Set by a replace action; takes precedence over `structured` on dispatch. */
  replacement: string | undefined = undefined;
  /** Set by a stop action. No further rule is evaluated once true. */
  terminated = false;

  constructor(raw: Buffer | string, fields: RecordFields) {
    this.raw = typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw;
    const values = new Map<string, string>();
    for (const name of FIELD_NAMES) {
      const value = fields[name];
      if (value !== undefined) values.set(name, value);
    }
    this.values = values;
  }

  /** Raw text of a field, or `undefined` when the record does not carry it. */
  field(name: string): string | undefined {
    return this.values.get(name);
  }

  /** Snapshot of all present fields, in declaration order. */
  fields(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  /**
   * Parsed JSON view of a field, memoized per record.
   *
   * For `msg` the live `structured` view is returned once a merge has
   * created it, so later query matchers see earlier merges. Parsing alone
   * never sets `structured`: a record no merge touched is sent as `raw`.
   * Returns `undefined` when the field is absent or not valid JSON.
   */
  structuredField(name: string): JsonValue | undefined {
    if (name === PAYLOAD_FIELD && this.structured !== undefined) {
      return this.structured;
    }

    if (!this.parsed.has(name)) {
      const text = this.values.get(name);
      this.parsed.set(name, text === undefined ? undefined : tryParseJson(text));
    }

    return this.parsed.get(name);
  }
}
