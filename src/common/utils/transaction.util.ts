import { Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { EngagementError } from '../errors/engagement-error';
import { Result } from '../result';

class RollbackSignal extends Error {
  constructor(readonly failure: EngagementError) {
    super(failure.message);
  }
}

/**
 * Runs `work` inside a managed transaction and rolls back when it returns a
 * failed Result. When the caller passes its own transaction the work joins it
 * and the caller decides the outcome.
 */
export async function runInTransaction<T>(
  sequelize: Sequelize,
  work: (transaction: Transaction) => Promise<Result<T>>,
  transaction?: Transaction,
): Promise<Result<T>> {
  if (transaction) {
    return work(transaction);
  }

  try {
    return await sequelize.transaction(async (managed) => {
      const result = await work(managed);
      if (!result.ok) {
        throw new RollbackSignal(result.error);
      }
      return result;
    });
  } catch (error) {
    if (error instanceof RollbackSignal) {
      return { ok: false, error: error.failure };
    }
    throw error;
  }
}
