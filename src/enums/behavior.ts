/**
 * Policies for unmatched globs, missing files and unowned file arguments
 */

import { defineEnum, EnumDescriptor, EnumMember } from './enum-descriptor';

/**
 * What to do when globs fail to match source files.
 * This is the policy the filesystem layer actually consumes.
 */
export const GlobMatchErrorBehavior = defineEnum('GlobMatchErrorBehavior', [
  'ignore',
  'warn',
  'error',
] as const);
export type GlobMatchErrorBehavior = EnumMember<typeof GlobMatchErrorBehavior>;

/**
 * A domain policy that can be handed to the glob matcher.
 * Conversion is one-way: there is no mapping back from GlobMatchErrorBehavior.
 */
export interface ConvertibleToGlobPolicy<T extends string> {
  toGlobMatchErrorBehavior(value: T): GlobMatchErrorBehavior;
}

type FilesNotFoundMember = 'warn' | 'error';

const FILES_NOT_FOUND_TO_GLOB: Record<FilesNotFoundMember, GlobMatchErrorBehavior> = {
  warn: 'warn',
  error: 'error',
};

/**
 * What to do when files and globs named in BUILD files cannot be found
 */
export const FilesNotFoundBehavior: EnumDescriptor<FilesNotFoundMember> &
  ConvertibleToGlobPolicy<FilesNotFoundMember> = Object.freeze({
  ...defineEnum<FilesNotFoundMember>('FilesNotFoundBehavior', ['warn', 'error']),
  toGlobMatchErrorBehavior(value: FilesNotFoundMember): GlobMatchErrorBehavior {
    return FILES_NOT_FOUND_TO_GLOB[value];
  },
});
export type FilesNotFoundBehavior = FilesNotFoundMember;

type OwnersNotFoundMember = 'ignore' | 'warn' | 'error';

const OWNERS_NOT_FOUND_TO_GLOB: Record<OwnersNotFoundMember, GlobMatchErrorBehavior> = {
  ignore: 'ignore',
  warn: 'warn',
  error: 'error',
};

/**
 * What to do when a file argument has no owning target
 */
export const OwnersNotFoundBehavior: EnumDescriptor<OwnersNotFoundMember> &
  ConvertibleToGlobPolicy<OwnersNotFoundMember> = Object.freeze({
  ...defineEnum<OwnersNotFoundMember>('OwnersNotFoundBehavior', ['ignore', 'warn', 'error']),
  toGlobMatchErrorBehavior(value: OwnersNotFoundMember): GlobMatchErrorBehavior {
    return OWNERS_NOT_FOUND_TO_GLOB[value];
  },
});
export type OwnersNotFoundBehavior = OwnersNotFoundMember;
