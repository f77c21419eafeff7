export { JsonConfiguration } from './json-configuration.js';
export type { ConfigurationSource } from './json-configuration.js';
export { ConfigurationError } from './errors.js';
export { makeExclusionTrie } from './exclusion.js';
export type { ExcludeItem, ExclusionTrie } from './exclusion.js';
export { prettyPrint, parsePrettyPrintOptions, prettyPrintOptionsSchema } from './pretty-print.js';
export type { PrettyPrintOptions } from './pretty-print.js';
export { FormatterRegistry, formatterRegistry, dateFormatter } from './formatters.js';
export type { ValueFormatter } from './formatters.js';
export { isPlainObject } from './values.js';
export type { ConfigObject } from './values.js';
