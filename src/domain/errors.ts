/**
 * Ledger error taxonomy. Every failure is terminal for the current
 * operation; callers display it and let the user retry.
 */
import type { MonthId } from './types.js';

export type LedgerErrorCode =
  | 'MONTH_CLOSED'
  | 'MONTH_NOT_OPEN'
  | 'MONTH_NOT_FOUND'
  | 'OBJECTIVE_MISSING'
  | 'NOT_FOUND'
  | 'ACCOUNT_NOT_ACTIVE'
  | 'INVALID_MONTH_ID'
  | 'INVALID_BACKUP'
  | 'INVALID_USER';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Write attempted against a closed month */
export class MonthClosedError extends LedgerError {
  constructor(readonly monthId: MonthId) {
    super('MONTH_CLOSED', `Month ${monthId} is closed. Add a correction to the current month.`);
  }
}

export class MonthNotOpenError extends LedgerError {
  constructor(readonly monthId: MonthId) {
    super('MONTH_NOT_OPEN', `Month ${monthId} does not exist or is already closed.`);
  }
}

export class MonthNotFoundError extends LedgerError {
  constructor(readonly monthId: MonthId) {
    super('MONTH_NOT_FOUND', `Month ${monthId} has not been initialized.`);
  }
}

/** No active objective row for the requested category */
export class ObjectiveMissingError extends LedgerError {
  constructor(readonly category: string) {
    super('OBJECTIVE_MISSING', `No objective defined for category ${category}`);
  }
}

export class NotFoundError extends LedgerError {
  constructor(entity: string, id: number) {
    super('NOT_FOUND', `${entity} ${id} not found`);
  }
}

/** Opening balance given for an account that does not apply to the month */
export class AccountNotActiveError extends LedgerError {
  constructor(readonly accountId: number, readonly monthId: MonthId) {
    super('ACCOUNT_NOT_ACTIVE', `Bank account ${accountId} is not active in ${monthId}`);
  }
}

export class InvalidMonthIdError extends LedgerError {
  constructor(value: string) {
    super('INVALID_MONTH_ID', `Invalid month id: ${JSON.stringify(value)} (expected YYYY-MM)`);
  }
}

export class InvalidBackupError extends LedgerError {
  constructor(message = 'Backup is not a readable SQLite database') {
    super('INVALID_BACKUP', message);
  }
}

export class InvalidUserError extends LedgerError {
  constructor(user: string) {
    super('INVALID_USER', `Invalid user name: ${JSON.stringify(user)}`);
  }
}
