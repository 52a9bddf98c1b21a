export type { JsonValue, JsonObject, JsonPrimitive } from './json.js';
export { isJsonObject, tryParseJson } from './json.js';
export { ConfigError, DispatcherClosedError } from './errors.js';
export type { ConfigIssue } from './errors.js';
export { LogRecord, FIELD_NAMES, PAYLOAD_FIELD } from './record.js';
export type { FieldName, RecordFields } from './record.js';
export { toEnvelope } from './envelope.js';
export type { DispatchEnvelope, EnvelopeSubmitter } from './envelope.js';
export { compileTemplate, compileFragment, formatIso8601, BUILTIN_VARIABLES } from './template.js';
export type { Template, TemplateFragment, VariableLookup } from './template.js';
export type { Rule } from './rule.js';
export * from './matchers/index.js';
export * from './actions/index.js';
