import dotenv from 'dotenv';
import { getConfig, ledgerConfigSchema, type LedgerConfig } from './config/index.js';
import { openLedgerDb } from './db/connection.js';
import { CreditLedger } from './ledger/creditLedger.js';
import { createLogger } from './log.js';
import { systemClock } from './util/clock.js';

export { CreditLedger, type BorrowerAssessment, type CreditLedgerOptions } from './ledger/creditLedger.js';
export { Role, ownerResolver, type Caller, type RoleResolver } from './auth/roles.js';
export { LedgerError, type LedgerErrorKind, type Result } from './util/errors.js';
export { sequenceClock, systemClock, type Clock, type SequenceClock } from './util/clock.js';
export { loadConfig, resetConfigCache, type LedgerConfig } from './config/index.js';
export { MEMORY_DB, openLedgerDb, closeLedgerDb } from './db/connection.js';
export { ratioBasisPoints, amortizedMonthlyPayment } from './math/fixedPoint.js';
export { deriveRiskCategory, deriveInterestRate, type RiskCategory } from './scoring/bands.js';
export { assessComprehensiveRisk, type RiskAssessment, type SubScores } from './scoring/engine.js';
export type { BorrowerProfile, ProfileInput } from './profiles/types.js';
export type { ActiveLoan, ApplicationStatus, LoanApplication, LoanState } from './loans/types.js';
export type { LedgerStats } from './ledger/stats.js';
export type { AuditEvent, AuditAction } from './ledger/audit.js';

/**
 * Reads .env and config/ledger.json, opens the configured database and
 * returns a ready ledger.
 */
export function openLedger(overrides: Partial<LedgerConfig> = {}): CreditLedger {
  dotenv.config();
  const config = ledgerConfigSchema.parse({ ...getConfig(), ...overrides });
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  const db = openLedgerDb(config.dbPath, logger);
  return new CreditLedger({
    db,
    ownerId: config.ownerId,
    modelVersion: config.modelVersion,
    clock: systemClock(),
    logger,
  });
}
