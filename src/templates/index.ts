export { TemplateResolver, formatTemplate } from './resolver.js';
export type { TemplateResolverOptions } from './resolver.js';
export { FileSystemTemplateSource, MemoryTemplateSource } from './sources.js';
export {
  DEFAULT_FALLBACK,
  DEFAULT_RULES,
  WILDCARD_TYPE,
  buildCandidates,
  compileRules,
  expandPattern,
  isSafeSlug,
  mergeRules,
} from './rules.js';
export type { CompiledRuleTable } from './rules.js';

export type {
  ContentDescriptor,
  ResolvedTemplate,
  RulePattern,
  RuleTable,
  TemplateSource,
} from './types.js';
