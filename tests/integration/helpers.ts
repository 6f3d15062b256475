import { CreditLedger } from '../../src/ledger/creditLedger.js';
import { MEMORY_DB, openLedgerDb } from '../../src/db/connection.js';
import { log } from '../../src/log.js';
import type { ProfileInput } from '../../src/profiles/types.js';
import { sequenceClock, type SequenceClock } from '../../src/util/clock.js';
import type { Result } from '../../src/util/errors.js';

export const OWNER = 'owner';

export function makeLedger(opts: { modelVersion?: number; start?: number } = {}): { ledger: CreditLedger; clock: SequenceClock } {
  const clock = sequenceClock(opts.start ?? 100);
  const db = openLedgerDb(MEMORY_DB, log);
  const ledger = new CreditLedger({ db, ownerId: OWNER, clock, modelVersion: opts.modelVersion });
  return { ledger, clock };
}

export function profileInput(overrides: Partial<ProfileInput> = {}): ProfileInput {
  return {
    creditScore: 720,
    annualIncome: 100_000n,
    totalDebt: 20_000n,
    employmentYears: 5,
    previousDefaults: 0,
    onTimePayments: 18,
    totalLoans: 20,
    ...overrides,
  };
}

/** Value of a successful result; fails the test otherwise. */
export function unwrap<T>(res: Result<T>): T {
  if (!res.ok) throw new Error(`expected ok, got ${res.error.kind}: ${res.error.message}`);
  return res.value;
}

export function kindOf<T>(res: Result<T>): string | null {
  return res.ok ? null : res.error.kind;
}
