import fc from 'fast-check';

// Small vocabulary so that generated sequences actually share n-grams.
export const INSTRUCTION_VOCABULARY = [
  'i32.add',
  'i32.sub',
  'i32.const',
  'i64.mul',
  'local.get',
  'local.set',
  'global.get',
  'f64.div',
  'block',
  'loop',
  'br_if',
  'call',
  'end',
  'drop',
  'return',
] as const;

export function arbitraryInstruction(): fc.Arbitrary<string> {
  return fc.constantFrom(...INSTRUCTION_VOCABULARY);
}

export function arbitraryTokenSequence(minLength = 0, maxLength = 40): fc.Arbitrary<string[]> {
  return fc.array(arbitraryInstruction(), { minLength, maxLength });
}

export function arbitraryNoiseToken(): fc.Arbitrary<string> {
  return fc.oneof(
    fc.integer({ min: -1000, max: 1000 }).map(String),
    fc.integer({ min: 0, max: 0xffff }).map((n) => `0x${n.toString(16)}`),
    fc.constantFrom('module', 'func', 'param', 'result', 'local', 'type', 'export', '$tmp', '"str"', 'i32', 'offset=8'),
  );
}

/** WAT-like text: instructions in order with literals, names and declarations in between. */
export function arbitraryWatText(): fc.Arbitrary<{ text: string; instructions: string[] }> {
  return fc
    .array(fc.tuple(arbitraryInstruction(), fc.array(arbitraryNoiseToken(), { maxLength: 3 })), { maxLength: 30 })
    .map((entries) => {
      const lines = entries.map(([instruction, noise]) => `  (${instruction} ${noise.join(' ')})`);
      return {
        text: `(module\n  (func $f (param i32) (result i32)\n${lines.join('\n')}))\n`,
        instructions: entries.map(([instruction]) => instruction),
      };
    });
}

export function arbitraryLines(maxLength = 200): fc.Arbitrary<string[]> {
  return fc.integer({ min: 0, max: maxLength }).map((count) => Array.from({ length: count }, (_, i) => `line ${i + 1}\n`));
}
