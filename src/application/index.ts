export { RuleSet } from './rule-set.js';
export type { RuleSetOptions, Evaluation } from './rule-set.js';
export { compileRules } from './rule-compiler.js';
export {
  configDocumentSchema,
  globalConfigSchema,
  ruleConfigSchema,
  actionConfigSchema,
  sinkConfSchema,
  jsonValueSchema,
} from './config-schema.js';
export type { ConfigDocument, GlobalConfig, RuleConfig, ActionConfig, SinkConf } from './config-schema.js';
export { parseSyslogLine } from './syslog-parser.js';
export { createLinePipeline, toRecord } from './pipeline.js';
export type { PipelineDeps, LineHandler } from './pipeline.js';
export { testRules, formatReport } from './rule-tester.js';
export type { RuleHit, LineReport } from './rule-tester.js';
export { NOOP_METRICS } from './metrics.js';
export type { Metrics } from './metrics.js';
