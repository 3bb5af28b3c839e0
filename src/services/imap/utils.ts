export const DELETED_FLAG = '\\Deleted';
export const SEEN_FLAG = '\\Seen';
export const RECENT_FLAG = '\\Recent';

const VOLATILE_FLAGS = new Set([SEEN_FLAG.toLowerCase(), RECENT_FLAG.toLowerCase()]);

export const toNumberUid = (value: unknown): number | null => {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  if (typeof value === 'bigint') {
    if (value <= 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      return null;
    }
    return Number(value);
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.trunc(parsed);
};

export const isDeleted = (flags: Iterable<string>): boolean => {
  for (const flag of flags) {
    if (flag.toLowerCase() === DELETED_FLAG.toLowerCase()) {
      return true;
    }
  }
  return false;
};

/** Flags worth carrying to the target; `\Seen` and `\Recent` never are. */
export const forwardableFlags = (flags: Iterable<string>): string[] =>
  Array.from(flags).filter((flag) => !VOLATILE_FLAGS.has(flag.toLowerCase()));

/**
 * Sorted, de-duplicated UID set in IMAP sequence-set syntax with contiguous
 * runs collapsed, e.g. `[7, 1, 2, 3]` becomes `1:3,7`.
 */
export const compressUidSet = (uids: Iterable<number>): string => {
  const sorted = Array.from(new Set(uids))
    .filter((uid) => Number.isInteger(uid) && uid > 0)
    .sort((left, right) => left - right);
  if (sorted.length === 0) {
    return '';
  }

  const ranges: string[] = [];
  let start = sorted[0];
  let previous = sorted[0];
  for (const uid of sorted.slice(1)) {
    if (uid === previous + 1) {
      previous = uid;
      continue;
    }
    ranges.push(start === previous ? `${start}` : `${start}:${previous}`);
    start = uid;
    previous = uid;
  }
  ranges.push(start === previous ? `${start}` : `${start}:${previous}`);
  return ranges.join(',');
};
