import type { UpdateChannel, VersionIdentifier } from '@shared/contracts';
import { MalformedVersionError } from '@main/services/update/UpdateErrors';

export type VersionOrder = -1 | 0 | 1;

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)(?:-([^+]+))?(?:\+(.+))?$/;

export class VersionComparator {
  parse(text: string): VersionIdentifier {
    const match = text.trim().match(VERSION_PATTERN);
    if (!match) {
      throw new MalformedVersionError(text);
    }

    const [, major, minor, patch, prerelease, buildMetadata] = match;
    const [majorNumber, minorNumber, patchNumber] = [Number(major), Number(minor), Number(patch)];
    if (![majorNumber, minorNumber, patchNumber].every(Number.isSafeInteger)) {
      throw new MalformedVersionError(text);
    }

    return {
      major: majorNumber,
      minor: minorNumber,
      patch: patchNumber,
      prerelease: prerelease ?? null,
      buildMetadata: buildMetadata ?? null
    };
  }

  tryParse(text: string): VersionIdentifier | null {
    try {
      return this.parse(text);
    } catch {
      return null;
    }
  }

  compare(left: VersionIdentifier, right: VersionIdentifier): VersionOrder {
    if (left.major !== right.major) {
      return sign(left.major - right.major);
    }
    if (left.minor !== right.minor) {
      return sign(left.minor - right.minor);
    }
    if (left.patch !== right.patch) {
      return sign(left.patch - right.patch);
    }

    if (left.prerelease === null && right.prerelease === null) {
      return 0;
    }
    if (left.prerelease === null) {
      return 1;
    }
    if (right.prerelease === null) {
      return -1;
    }

    // Ordem lexical por code unit: "test10" < "test9".
    if (left.prerelease < right.prerelease) {
      return -1;
    }
    if (left.prerelease > right.prerelease) {
      return 1;
    }
    return 0;
  }

  isStable(version: VersionIdentifier): boolean {
    return version.prerelease === null;
  }

  extractBase(version: VersionIdentifier): VersionIdentifier {
    return {
      major: version.major,
      minor: version.minor,
      patch: version.patch,
      prerelease: null,
      buildMetadata: null
    };
  }

  /**
   * Stable users never receive pre-release builds. Otherwise a newer base line
   * is accepted outright, and within the same base only a strictly newer build is.
   */
  isEligible(current: VersionIdentifier, candidate: VersionIdentifier, channel: UpdateChannel): boolean {
    if (channel === 'stable' && !this.isStable(candidate)) {
      return false;
    }

    const baseOrder = this.compare(this.extractBase(candidate), this.extractBase(current));
    if (baseOrder > 0) {
      return true;
    }
    if (baseOrder < 0) {
      return false;
    }

    return this.compare(candidate, current) > 0;
  }

  format(version: VersionIdentifier): string {
    const base = `${version.major}.${version.minor}.${version.patch}`;
    const withPre = version.prerelease ? `${base}-${version.prerelease}` : base;
    return version.buildMetadata ? `${withPre}+${version.buildMetadata}` : withPre;
  }

  formatDisplay(version: VersionIdentifier): string {
    return `Version ${this.format(this.stripBuild(version))}`;
  }

  private stripBuild(version: VersionIdentifier): VersionIdentifier {
    return { ...version, buildMetadata: null };
  }
}

function sign(value: number): VersionOrder {
  if (value > 0) {
    return 1;
  }
  return value < 0 ? -1 : 0;
}
