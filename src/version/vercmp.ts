/**
 * Arch package version ordering.
 *
 * Implements the segment-wise alphanumeric comparison used by pacman:
 * epoch first, then the upstream version, then the release.
 * @module version/vercmp
 */

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isAlpha(ch: string | undefined): boolean {
  return ch !== undefined && ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z'));
}

function isAlnum(ch: string | undefined): boolean {
  return isDigit(ch) || isAlpha(ch);
}

/**
 * Compares two version fragments (no epoch or release handling).
 * Returns -1, 0 or 1.
 */
export function compareSegments(a: string, b: string): number {
  if (a === b) {
    return 0;
  }

  let one = 0;
  let two = 0;
  let seg1 = 0;
  let seg2 = 0;

  while (one < a.length && two < b.length) {
    while (one < a.length && !isAlnum(a[one])) one++;
    while (two < b.length && !isAlnum(b[two])) two++;

    if (one >= a.length || two >= b.length) {
      break;
    }

    // a different number of separators decides on its own
    if (one - seg1 !== two - seg2) {
      return one - seg1 < two - seg2 ? -1 : 1;
    }

    seg1 = one;
    seg2 = two;

    const isNum = isDigit(a[seg1]);
    if (isNum) {
      while (seg1 < a.length && isDigit(a[seg1])) seg1++;
      while (seg2 < b.length && isDigit(b[seg2])) seg2++;
    } else {
      while (seg1 < a.length && isAlpha(a[seg1])) seg1++;
      while (seg2 < b.length && isAlpha(b[seg2])) seg2++;
    }

    let left = a.slice(one, seg1);
    let right = b.slice(two, seg2);

    if (right.length === 0) {
      // numeric segments are always newer than alpha segments
      return isNum ? 1 : -1;
    }

    if (isNum) {
      left = left.replace(/^0+/, '');
      right = right.replace(/^0+/, '');
      if (left.length !== right.length) {
        return left.length > right.length ? 1 : -1;
      }
    }

    if (left !== right) {
      return left < right ? -1 : 1;
    }

    one = seg1;
    two = seg2;
  }

  if (one >= a.length && two >= b.length) {
    return 0;
  }

  // a remaining alpha segment never beats an empty one
  if ((one >= a.length && !isAlpha(b[two])) || isAlpha(a[one])) {
    return -1;
  }
  return 1;
}

interface Evr {
  epoch: string;
  version: string;
  release?: string;
}

function splitEvr(evr: string): Evr {
  let pos = 0;
  while (pos < evr.length && isDigit(evr[pos])) pos++;

  let epoch = '0';
  let rest = evr;
  if (evr[pos] === ':') {
    epoch = evr.slice(0, pos) || '0';
    rest = evr.slice(pos + 1);
  }

  const dash = rest.lastIndexOf('-');
  if (dash === -1) {
    return { epoch, version: rest };
  }
  return { epoch, version: rest.slice(0, dash), release: rest.slice(dash + 1) };
}

/**
 * Compares two full version strings (`[epoch:]version[-release]`).
 * Returns -1, 0 or 1.
 */
export function vercmp(a: string, b: string): number {
  if (a === b) {
    return 0;
  }

  const left = splitEvr(a);
  const right = splitEvr(b);

  let ret = compareSegments(left.epoch, right.epoch);
  if (ret === 0) {
    ret = compareSegments(left.version, right.version);
    if (ret === 0 && left.release !== undefined && right.release !== undefined) {
      ret = compareSegments(left.release, right.release);
    }
  }
  return ret;
}
