import type { LogRecord } from './record.js';

/** The (topic, payload) pair handed to the dispatcher once per record. */
export interface DispatchEnvelope {
  readonly topic: string;
  readonly payload: Buffer;
}

/** Anything that admits envelopes, blocking while its buffer is full. */
export interface EnvelopeSubmitter {
  submit(envelope: DispatchEnvelope): Promise<void>;
}

/**
 * Builds the outgoing envelope for an evaluated record.
 *
 * Payload precedence: a replace action's output, then the serialized
 * structured view, then the raw inbound bytes.
 */
export function toEnvelope(record: LogRecord, topic: string): DispatchEnvelope {
  let payload: Buffer;
  if (record.replacement !== undefined) {
    payload = Buffer.from(record.replacement, 'utf8');
  } else if (record.structured !== undefined) {
    payload = Buffer.from(JSON.stringify(record.structured), 'utf8');
  } else {
    payload = record.raw;
  }
  return { topic, payload };
}
