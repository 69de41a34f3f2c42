import { InvalidVersionFormatError } from '../errors';

/**
 * A validated release version (`vMAJOR.MINOR.PATCH[-SNAPSHOT]`).
 */
export type Version = Readonly<{
  /** Tag form, e.g. `v1.2.3` */
  tag: string;
  /** Numeric form without the `v` prefix, e.g. `1.2.3` */
  number: string;
  major: number;
  minor: number;
  patch: number;
  snapshot: boolean;
}>;

export type VersionParts = {
  major: number;
  minor: number;
  patch: number;
  snapshot: boolean;
};

const VERSION_TAG_REGEX = /^v(\d+)\.(\d+)\.(\d+)(-SNAPSHOT)?$/;
const VERSION_NUMBER_REGEX = /^(\d+)\.(\d+)\.(\d+)(-SNAPSHOT)?$/;
const RELEASE_TAG_REGEX = /^v\d+\.\d+\.\d+$/;

function toParts(match: RegExpMatchArray): VersionParts {
  const [, major = '0', minor = '0', patch = '0', snapshot] = match;
  return {
    major: parseInt(major, 10),
    minor: parseInt(minor, 10),
    patch: parseInt(patch, 10),
    snapshot: snapshot !== undefined,
  };
}

/**
 * Validates user input or a discovered tag and returns an immutable Version.
 * @throws InvalidVersionFormatError for anything outside the grammar.
 */
export function validateVersion(input: string): Version {
  const match = input.match(VERSION_TAG_REGEX);
  if (!match) {
    throw new InvalidVersionFormatError(input);
  }

  return Object.freeze({
    tag: input,
    number: toNumeric(input),
    ...toParts(match),
  });
}

export function isValidVersion(input: string): boolean {
  return VERSION_TAG_REGEX.test(input);
}

/**
 * `v1.2.3` → `1.2.3`. Input without the prefix is returned unchanged.
 */
export function toNumeric(tag: string): string {
  return tag.startsWith('v') ? tag.slice(1) : tag;
}

/**
 * `1.2.3` → `v1.2.3`. Input already carrying the prefix is returned unchanged.
 */
export function toTag(version: string): string {
  return version.startsWith('v') ? version : `v${version}`;
}

/**
 * Parses the numeric form used by release-note file names.
 */
export function parseVersionNumber(version: string): VersionParts | null {
  const match = version.match(VERSION_NUMBER_REGEX);
  return match ? toParts(match) : null;
}

/**
 * Numeric comparison on (major, minor, patch); a snapshot sorts below
 * its release. Unparseable versions sort below every parseable one and
 * fall back to string order among themselves.
 */
export function compareVersionNumbers(a: string, b: string): number {
  const pa = parseVersionNumber(a);
  const pb = parseVersionNumber(b);

  if (!pa && !pb) return a.localeCompare(b);
  if (!pa) return -1;
  if (!pb) return 1;

  if (pa.major !== pb.major) return pa.major - pb.major;
  if (pa.minor !== pb.minor) return pa.minor - pb.minor;
  if (pa.patch !== pb.patch) return pa.patch - pb.patch;
  if (pa.snapshot === pb.snapshot) return 0;
  return pa.snapshot ? -1 : 1;
}

/**
 * True for published release tags (`vX.Y.Z`, no snapshot suffix).
 */
export function isReleaseTag(tag: string): boolean {
  return RELEASE_TAG_REGEX.test(tag);
}
