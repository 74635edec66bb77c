/* eslint-disable no-param-reassign */
import { isPostgres, toDate, Transaction } from '../util/db';
import { explorerTable, ExplorerTableName } from './schema';

export type RecordFields = { [column: string]: unknown };

export interface RecordConstructor extends Function {
  table: ExplorerTableName;
}

/**
 * True if the value is a record class, i.e. has its table set
 * @param value - the constructor to check
 */
function isRecordConstructor(value: Function): value is RecordConstructor {
  return 'table' in value && typeof value.table === 'string';
}

/**
 * Before saving a record, set the appropriate date fields.
 * This will mutate the Record and the fields.
 * @param record - the record to update
 * @param fields - the fields to update
 * @returns boolean indicating whether this is a new record
 */
function setDateFields(record: Record, fields: RecordFields): boolean {
  const updatedAt = new Date();
  record.updatedAt = updatedAt;
  fields.updatedAt = updatedAt;

  const newRecord = !record.createdAt;
  if (newRecord) {
    record.createdAt = record.updatedAt;
    fields.createdAt = record.createdAt;
  }
  return newRecord;
}

/**
 * Abstract class describing a database record.  Subclass database tables
 * must define a unique primary key called `id` and timestamps
 * `created_at` and `updated_at`.
 *
 * In order to save, subclasses must have ClassName.table set to their
 * table name.
 */
export default abstract class Record {
  updatedAt?: Date;

  createdAt?: Date;

  id?: number;

  static table: ExplorerTableName;

  /**
   * Creates a Record instance (Should not be called directly)
   *
   * @param fields - Object containing to set on the record
   */
  constructor(fields: RecordFields) {
    // SQLite hands back timestamps as epoch milliseconds
    this.id = typeof fields.id === 'number' ? fields.id : undefined;
    this.createdAt = toDate(fields.createdAt) ?? undefined;
    this.updatedAt = toDate(fields.updatedAt) ?? undefined;
  }

  /**
   * Validates the record.  Returns null if the record is valid.  Returns
   * a list of errors if it is invalid.
   *
   * @returns a list of validation errors, or null if the record is valid
   */
  validate(): string[] | null {
    return null;
  }

  /**
   * The column values to save
   */
  abstract toRow(): RecordFields;

  /**
   * Validates and saves the record using the given transaction.  Throws an error if the
   * record is not valid.  New records will be inserted and have their id, createdAt, and
   * updatedAt fields set.  Existing records will be updated and have their updatedAt
   * field set.
   *
   * @param transaction - The transaction to use for saving the record
   * @param fields - The fields to save to the database, defaults to all of them
   * @throws Error - if the record is invalid
   */
  async save(transaction: Transaction, fields: RecordFields = this.toRow()): Promise<void> {
    const errors = this.validate();
    if (errors) {
      throw new TypeError(`${this.constructor.name} is invalid: ${JSON.stringify(errors)}`);
    }
    if (!isRecordConstructor(this.constructor)) {
      throw new TypeError(`${this.constructor.name} has no table`);
    }
    const table = explorerTable(this.constructor.table, transaction);
    const newRecord = setDateFields(this, fields);
    if (newRecord) {
      const stmt = transaction(table).insert(fields);
      // Postgres requires `returning` to return the id of the inserted record
      const [inserted]: unknown[] = isPostgres(transaction) ? await stmt.returning('id') : await stmt;
      // pg returns [{ id }], SQLite returns [id]
      if (typeof inserted === 'number') {
        this.id = inserted;
      } else if (inserted && typeof inserted === 'object' && 'id' in inserted && typeof inserted.id === 'number') {
        this.id = inserted.id;
      }
    } else {
      await transaction(table)
        .where({ id: this.id })
        .update(fields);
    }
  }
}
