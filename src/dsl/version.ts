/**
 * Specification document versioning.
 *
 * Producers and consumers declare the document version they emit or accept.
 */

/** Supported specification document versions. */
export const SPEC_VERSIONS = ['1.0.0'] as const;
export type SpecVersion = (typeof SPEC_VERSIONS)[number];

/** The current default specification version. */
export const CURRENT_SPEC_VERSION: SpecVersion = '1.0.0';

/** Check if a version string is a supported specification version. */
export function isSupportedVersion(version: string): version is SpecVersion {
  return (SPEC_VERSIONS as readonly string[]).includes(version);
}
