/**
 * CLI Module
 *
 * Help rendering for declared options
 */

export { formatOptionsHelp, formatOptionSignature, formatDefaultValue } from './help';
export type { HelpOptions } from './help';
