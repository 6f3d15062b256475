import { CreditLedger } from '../../src/ledger/creditLedger.js';
import { MEMORY_DB, openLedgerDb } from '../../src/db/connection.js';
import { log } from '../../src/log.js';
import { sequenceClock } from '../../src/util/clock.js';
import { OWNER, kindOf, profileInput, unwrap } from './helpers.js';

describe('ledger atomicity', () => {
  test('rejected operations leave no trace', () => {
    const db = openLedgerDb(MEMORY_DB, log);
    const ledger = new CreditLedger({ db, ownerId: OWNER, clock: sequenceClock() });
    ledger.registerProfile('alice', profileInput());
    const auditRows = () => db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM ledger_audit').get()?.n;
    const before = auditRows();

    expect(kindOf(ledger.registerProfile('alice', profileInput({ creditScore: 900 })))).toBe('InvalidParameters');
    expect(kindOf(ledger.apply('alice', 1_000n, 'x', 500))).toBe('InvalidParameters');
    expect(kindOf(ledger.approve(OWNER, 1))).toBe('NotFound');
    expect(auditRows()).toBe(before);
    expect(ledger.getProfile('alice')?.creditScore).toBe(720);
    expect(unwrap(ledger.apply('alice', 1_000n, 'x', 12))).toBe(1);
    ledger.close();
  });

  test('a storage fault midway through disbursement rolls everything back', () => {
    const db = openLedgerDb(MEMORY_DB, log);
    const ledger = new CreditLedger({ db, ownerId: OWNER, clock: sequenceClock() });
    ledger.registerProfile('alice', profileInput());
    const id = unwrap(ledger.apply('alice', 8_000n, 'x', 12));
    unwrap(ledger.approve(OWNER, id));

    // The audit insert is the last write of a disbursement.
    db.exec('ALTER TABLE ledger_audit RENAME TO ledger_audit_parked');
    expect(() => ledger.disburse(OWNER, id)).toThrow(/no such table/);
    db.exec('ALTER TABLE ledger_audit_parked RENAME TO ledger_audit');

    expect(ledger.getApplication(id)?.status).toBe('approved');
    expect(ledger.getActiveLoan(id)).toBeNull();
    expect(ledger.getStats()).toEqual({ totalLoansIssued: 0, totalAmountDisbursed: 0n, modelVersion: 1 });

    expect(unwrap(ledger.disburse(OWNER, id)).principalAmount).toBe(8_000n);
    expect(ledger.getStats().totalAmountDisbursed).toBe(8_000n);
    ledger.close();
  });
});
