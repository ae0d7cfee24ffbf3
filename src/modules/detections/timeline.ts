export type PresenceSession = {
  firstSeen: number;
  lastSeen: number;
  detections: number;
};

/**
 * Merges ascending detection timestamps (epoch ms) into contiguous sessions.
 * A detection joins the open session when it follows the previous one by at
 * most `gapMs`; otherwise it starts a new session.
 */
export function mergeSessions(sortedTimestamps: readonly number[], gapMs: number): PresenceSession[] {
  const sessions: PresenceSession[] = [];
  let current: PresenceSession | null = null;

  for (const timestamp of sortedTimestamps) {
    if (current && timestamp - current.lastSeen <= gapMs) {
      current.lastSeen = timestamp;
      current.detections += 1;
      continue;
    }
    current = { firstSeen: timestamp, lastSeen: timestamp, detections: 1 };
    sessions.push(current);
  }

  return sessions;
}
