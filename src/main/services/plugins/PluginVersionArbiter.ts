import type { PluginDescriptor } from '@shared/contracts';
import type { PluginRegistry } from '@main/services/plugins/collaborators';

export type VersionOrdering = -1 | 0 | 1;

const SEGMENT_SEPARATOR = /[.\-_ ]+/;

export class PluginVersionArbiter {
  constructor(private readonly registry: Pick<PluginRegistry, 'isKnownBroken'>) {}

  /**
   * Positive when `candidateVersion` should replace the installed plugin. A plugin on the
   * known-broken list is always replaceable, even by an older or equal version.
   */
  compare(candidateVersion: string, installed: PluginDescriptor): VersionOrdering {
    const state = compareVersionNumbers(candidateVersion, installed.version);
    if (state <= 0 && this.registry.isKnownBroken(installed)) {
      return 1;
    }

    return state;
  }
}

export function compareVersionNumbers(left: string, right: string): VersionOrdering {
  const a = splitSegments(left);
  const b = splitSegments(right);
  const size = Math.max(a.length, b.length);

  for (let index = 0; index < size; index += 1) {
    const leftSegment = a[index] ?? '0';
    const rightSegment = b[index] ?? '0';
    if (leftSegment === rightSegment) {
      continue;
    }

    const leftNumeric = /^\d+$/.test(leftSegment);
    const rightNumeric = /^\d+$/.test(rightSegment);
    if (leftNumeric && rightNumeric) {
      const diff = compareDigits(leftSegment, rightSegment);
      if (diff !== 0) {
        return diff;
      }
      continue;
    }
    if (leftNumeric) {
      return 1;
    }
    if (rightNumeric) {
      return -1;
    }

    return leftSegment < rightSegment ? -1 : 1;
  }

  return 0;
}

/** Compares digit strings of any length without converting them to numbers. */
function compareDigits(left: string, right: string): VersionOrdering {
  const a = left.replace(/^0+(?=\d)/, '');
  const b = right.replace(/^0+(?=\d)/, '');
  if (a.length !== b.length) {
    return a.length < b.length ? -1 : 1;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function splitSegments(version: string): string[] {
  const trimmed = version.trim();
  return trimmed ? trimmed.split(SEGMENT_SEPARATOR) : [];
}
