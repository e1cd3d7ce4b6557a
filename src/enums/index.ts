/**
 * Enums module - closed value sets used by option types
 */

export { defineEnum } from './enum-descriptor';
export type { EnumDescriptor, EnumMember } from './enum-descriptor';

export {
  GlobMatchErrorBehavior,
  FilesNotFoundBehavior,
  OwnersNotFoundBehavior,
} from './behavior';
export type { ConvertibleToGlobPolicy } from './behavior';

export { LogLevelEnum, SPECULATION_STRATEGIES } from './option-enums';
export type { SpeculationStrategy } from './option-enums';
