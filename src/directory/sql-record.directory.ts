import { Logger } from '@nestjs/common';
import { QueryTypes } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { RecordDirectory } from './directory.interfaces';

const TABLE_NAME = /^[a-z_][a-z0-9_]*$/i;

/** Existence checks against a table reached through the shared connection. */
export class SqlRecordDirectory implements RecordDirectory {
  private readonly logger = new Logger(SqlRecordDirectory.name);

  constructor(
    private readonly sequelize: Sequelize,
    private readonly tableName: string,
  ) {
    if (!TABLE_NAME.test(tableName)) {
      throw new Error(`Invalid directory table name: ${tableName}`);
    }
  }

  async existing(ids: number[]): Promise<Set<number>> {
    if (ids.length === 0) {
      return new Set();
    }

    const rows = await this.sequelize.query<{ id: number }>(
      `SELECT id FROM "${this.tableName}" WHERE id IN (:ids)`,
      { replacements: { ids }, type: QueryTypes.SELECT },
    );
    this.logger.debug(`${this.tableName}: ${rows.length}/${ids.length} ids found`);
    return new Set(rows.map((row) => Number(row.id)));
  }
}
