const chars = (value: string) => Array.from(value.toLowerCase());

const lcsLength = (a: string[], b: string[]) => {
  if (!a.length || !b.length) {
    return 0;
  }
  let previous = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      current[j] = a[i - 1] === b[j - 1] ? previous[j - 1] + 1 : Math.max(previous[j], current[j - 1]);
    }
    previous = current;
  }
  return previous[b.length];
};

const ratioOf = (a: string[], b: string[]) => {
  const total = a.length + b.length;
  if (total === 0) {
    return 100;
  }
  return (200 * lcsLength(a, b)) / total;
};

/** Normalized Indel similarity in [0, 100]. */
export const ratio = (a: string, b: string) => ratioOf(chars(a), chars(b));

/** Best {@link ratio} of the shorter string against every equal-length window of the longer one. */
export const partialRatio = (a: string, b: string) => {
  let shorter = chars(a);
  let longer = chars(b);
  if (shorter.length > longer.length) {
    [shorter, longer] = [longer, shorter];
  }
  if (!shorter.length) {
    return 0;
  }
  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start += 1) {
    const score = ratioOf(shorter, longer.slice(start, start + shorter.length));
    if (score > best) {
      best = score;
      if (best === 100) {
        break;
      }
    }
  }
  return best;
};
