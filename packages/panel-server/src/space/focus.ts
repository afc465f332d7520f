import type { FocusSignal, FocusStatus } from '@edgebar/shared';

export type FocusChannel = 'keyboard' | 'pointer';

interface TrackedFocus {
  channel: FocusChannel;
  surfaceId: string;
  status: FocusStatus;
}

/**
 * Latest keyboard focus and pointer hover status per surface, shared by every panel
 * instance.
 */
export class FocusTracker {
  private readonly entries = new Map<string, TrackedFocus>();

  record(signal: FocusSignal, channel: FocusChannel = 'pointer'): void {
    this.entries.set(`${channel}:${signal.surfaceId}`, {
      channel,
      surfaceId: signal.surfaceId,
      status: signal.status,
    });
  }

  forget(surfaceId: string): void {
    this.entries.delete(`keyboard:${surfaceId}`);
    this.entries.delete(`pointer:${surfaceId}`);
  }

  /**
   * Drops every surface `keep` rejects. Returns how many surfaces were dropped.
   */
  retain(keep: (surfaceId: string) => boolean): number {
    const dropped = new Set<string>();
    for (const [key, entry] of this.entries) {
      if (!keep(entry.surfaceId)) {
        this.entries.delete(key);
        dropped.add(entry.surfaceId);
      }
    }
    return dropped.size;
  }

  signals(): FocusSignal[] {
    return Array.from(this.entries.values(), (entry) => ({
      surfaceId: entry.surfaceId,
      status: entry.status,
    }));
  }
}

/**
 * Folds the signals of a panel's own surfaces into one status. Any `focused` wins;
 * otherwise the most recent `last_focused` time, starting from `since`.
 */
export function resolveFocus(
  signals: Iterable<FocusSignal>,
  surfaceIds: readonly string[],
  since: number,
): FocusStatus {
  let result: FocusStatus = { kind: 'last_focused', at: since };
  for (const signal of signals) {
    if (!surfaceIds.includes(signal.surfaceId)) {
      continue;
    }
    if (result.kind === 'focused') {
      break;
    }
    if (signal.status.kind === 'focused') {
      result = signal.status;
    } else if (signal.status.at > result.at) {
      result = signal.status;
    }
  }
  return result;
}
