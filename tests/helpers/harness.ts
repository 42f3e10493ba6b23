/**
 * POKE ARENA - Test Utilities
 *
 * Minimal pass/fail counter shared by every tests/*.test.ts script.
 * Each script calls its test functions, then summary() exits non-zero on
 * any failure.
 */

let passed = 0;
let failed = 0;
const failures: string[] = [];

export function assert(condition: boolean, message: string): void {
  if (!condition) {
    failed++;
    failures.push(message);
    console.log(`  FAIL: ${message}`);
  } else {
    passed++;
    console.log(`  PASS: ${message}`);
  }
}

/** Deep equality through JSON, enough for plain engine data. */
export function assertEqual(actual: unknown, expected: unknown, message: string): void {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  assert(a === e, a === e ? message : `${message} (actual: ${a}, expected: ${e})`);
}

export function assertApprox(actual: number, expected: number, tolerance: number, message: string): void {
  assert(Math.abs(actual - expected) <= tolerance, `${message} (actual: ${actual}, expected: ${expected}, tolerance: ${tolerance})`);
}

/** Passes when `fn` throws an error that satisfies `check`. */
export function assertThrows(fn: () => unknown, check: (err: unknown) => boolean, message: string): void {
  try {
    fn();
  } catch (err) {
    assert(check(err), `${message} (threw ${err instanceof Error ? err.name : String(err)})`);
    return;
  }
  assert(false, `${message} (did not throw)`);
}

export function section(name: string): void {
  console.log(`\n--- ${name} ---`);
}

/** Print results and exit non-zero if anything failed. */
export function summary(): void {
  console.log('\n==============================');
  console.log(`RESULTS: ${passed} passed, ${failed} failed`);

  if (failures.length > 0) {
    console.log('\nFAILURES:');
    for (const f of failures) {
      console.log(`  - ${f}`);
    }
    process.exit(1);
  } else {
    console.log('All tests passed!');
  }
}
