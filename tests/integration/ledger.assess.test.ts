import { CreditLedger } from '../../src/ledger/creditLedger.js';
import { MEMORY_DB, openLedgerDb } from '../../src/db/connection.js';
import { log } from '../../src/log.js';
import { Role } from '../../src/auth/roles.js';
import { sequenceClock } from '../../src/util/clock.js';
import { OWNER, kindOf, makeLedger, profileInput, unwrap } from './helpers.js';

describe('comprehensive assessment through the ledger', () => {
  test('anyone can assess a registered borrower without writing anything', () => {
    const { ledger } = makeLedger({ modelVersion: 3 });
    ledger.registerProfile('alice', profileInput());
    const before = ledger.getAuditTrail('alice');

    const a = unwrap(ledger.assessComprehensiveRisk('alice', 50_000n, 'equipment'));
    expect(a).toMatchObject({
      borrower: 'alice',
      purpose: 'equipment',
      modelVersion: 3,
      finalRiskScore: 759,
      riskCategory: 'low',
      recommendedInterestRate: 300,
      maxRecommendedAmount: 40_000n,
      approvalRecommendation: true,
    });
    expect(unwrap(ledger.assessComprehensiveRisk('alice', 50_000n, 'equipment'))).toEqual(a);
    expect(ledger.getAuditTrail('alice')).toEqual(before);
    expect(ledger.getStats().totalLoansIssued).toBe(0);
    ledger.close();
  });

  test('rejects unknown borrowers and bad requests', () => {
    const { ledger } = makeLedger();
    expect(kindOf(ledger.assessComprehensiveRisk('ghost', 1_000n, 'x'))).toBe('NotFound');
    ledger.registerProfile('alice', profileInput());
    expect(kindOf(ledger.assessComprehensiveRisk('alice', 0n, 'x'))).toBe('InvalidAmount');
    expect(kindOf(ledger.assessComprehensiveRisk('alice', 1_000n, 'p'.repeat(101)))).toBe('InvalidParameters');
    ledger.close();
  });

  test('profile updates change later assessments but not snapshotted rates', () => {
    const { ledger } = makeLedger();
    ledger.registerProfile('alice', profileInput());
    const id = unwrap(ledger.apply('alice', 5_000n, 'car', 24));
    unwrap(ledger.registerProfile('alice', profileInput({ creditScore: 560, previousDefaults: 3 })));
    expect(ledger.getProfile('alice')?.riskCategory).toBe('high');
    expect(ledger.getApplication(id)).toMatchObject({ riskScore: 720, interestRate: 300 });
    // 47*35 + 60*25 + 90*20 + 50*10 + 0*10 = 5445 → 54; 500 + 54*350/100 = 689
    expect(unwrap(ledger.assessComprehensiveRisk('alice', 5_000n, 'car')).finalRiskScore).toBe(689);
    ledger.close();
  });

  test('model version is fixed by the first open of a store', () => {
    const db = openLedgerDb(MEMORY_DB, log);
    new CreditLedger({ db, ownerId: OWNER, clock: sequenceClock(), modelVersion: 3 });
    const reopened = new CreditLedger({ db, ownerId: OWNER, clock: sequenceClock(), modelVersion: 7 });
    expect(reopened.getStats().modelVersion).toBe(3);
    reopened.close();
  });

  test('a custom role resolver decides who the owner is', () => {
    const db = openLedgerDb(MEMORY_DB, log);
    const ledger = new CreditLedger({
      db,
      clock: sequenceClock(),
      resolveRole: (id) => (id.startsWith('staff:') ? Role.OWNER : Role.BORROWER),
    });
    ledger.registerProfile('alice', profileInput());
    const id = unwrap(ledger.apply('alice', 1_000n, 'x', 12));
    expect(kindOf(ledger.approve(OWNER, id))).toBe('Unauthorized');
    expect(unwrap(ledger.approve('staff:carol', id)).status).toBe('approved');
    ledger.close();
  });
});
