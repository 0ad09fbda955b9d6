/**
 * Rename spans that share a name so every name in the sequence is unique.
 *
 * Names that occur once are left alone. Names that occur more than once get
 * a 1-based suffix in their original relative order:
 * `[red, red, blue, red, green, blue]` becomes
 * `[red_1, red_2, blue_1, red_3, green, blue_2]`.
 *
 * Two passes: a name can only be numbered once it is known whether it
 * repeats later in the sequence. Only `name` is written; order and span
 * identity are untouched.
 */
export function deduplicateSpanNamesInPlace(spans: ReadonlyArray<{ name: string }>): void {
  const counts = new Map<string, number>();
  for (const span of spans) {
    counts.set(span.name, (counts.get(span.name) ?? 0) + 1);
  }

  // Labels that must not be produced: names that stay as they are, plus
  // every label generated so far.
  const taken = new Set<string>();
  for (const [name, count] of counts) {
    if (count === 1) taken.add(name);
  }

  const counters = new Map<string, number>();
  for (const span of spans) {
    const original = span.name;
    if (counts.get(original) === 1) continue;

    let counter = counters.get(original) ?? 0;
    let label: string;
    do {
      counter += 1;
      label = `${original}_${counter}`;
    } while (taken.has(label));

    counters.set(original, counter);
    taken.add(label);
    span.name = label;
  }
}
