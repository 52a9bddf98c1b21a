import { z } from 'zod';
import type { JsonValue } from '../domain/index.js';
import { FIELD_NAMES } from '../domain/index.js';

/** Any JSON-compatible value: the shape of a merge fragment. */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

const portSchema = z.number().int().min(0).max(65535);

/** `host:port`, e.g. `localhost:8125`. */
const hostPortSchema = z.string().regex(/^[^\s:]+:\d{1,5}$/, 'Must be host:port');

const listenSchema = z.object({
  address: z.string().min(1).default('127.0.0.1'),
  port: portSchema,
  tls: z.object({
    cert: z.string().min(1),
    key: z.string().min(1),
  }).strict().optional(),
}).strict();

const statusSchema = z.object({
  address: z.string().min(1).default('127.0.0.1'),
  port: portSchema,
}).strict();

/**
 * Settings for the broker client, an open mapping. Known keys are typed
 * and handed to the Redis client; `bootstrap.servers` is accepted as a
 * `host:port[,host:port]` list. Other keys are kept as given and left to
 * the sink to report.
 */
export const sinkConfSchema = z.object({
  'bootstrap.servers': z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: portSchema.optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  db: z.number().int().min(0).optional(),
  tls: z.boolean().optional(),
  connectTimeout: z.number().int().positive().optional(),
  maxlen: z.number().int().positive().optional(),
}).passthrough();

export type SinkConf = z.infer<typeof sinkConfSchema>;

const kafkaSchema = z.object({
  buffer: z.number().int().positive().default(1024),
  conf: sinkConfSchema.default({}),
  topic: z.string().min(1),
}).strict();

const metricsSchema = z.object({
  statsd: hostPortSchema.optional(),
}).strict();

/**
 * A single configured action. Unknown `type` tags fail here, at load,
 * so the evaluation loop never re-interprets a tag.
 */
export const actionConfigSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('merge'), json: jsonValueSchema }).strict(),
  z.object({ type: z.literal('stop') }).strict(),
  z.object({ type: z.literal('forward'), topic: z.string().min(1) }).strict(),
  z.object({ type: z.literal('replace'), template: z.string() }).strict(),
]);

export type ActionConfig = z.infer<typeof actionConfigSchema>;

/** Exactly one of `jmespath` / `regex` selects the matcher variant. */
export const ruleConfigSchema = z.object({
  jmespath: z.string().optional(),
  regex: z.string().optional(),
  field: z.enum(FIELD_NAMES).default('msg'),
  actions: z.array(actionConfigSchema).default([]),
}).strict().superRefine((rule, ctx) => {
  const kinds = [rule.jmespath, rule.regex].filter((k) => k !== undefined).length;
  if (kinds !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Exactly one of "jmespath" or "regex" is required',
    });
  }
});

export type RuleConfig = z.infer<typeof ruleConfigSchema>;

export const globalConfigSchema = z.object({
  listen: listenSchema,
  status: statusSchema,
  kafka: kafkaSchema,
  metrics: metricsSchema.default({}),
}).strict();

export type GlobalConfig = z.infer<typeof globalConfigSchema>;

/** Top-level configuration document. */
export const configDocumentSchema = z.object({
  global: globalConfigSchema,
  rules: z.array(ruleConfigSchema).default([]),
}).strict();

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
