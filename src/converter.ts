import * as _ from 'lodash-es';
import { toRecord } from './columns';
import { ERROR_MESSAGES } from './constants';
import { ConfigError } from './errors';

export type FlatRow = Record<string, unknown>;

function isNestedMap(value: unknown): value is ReadonlyMap<unknown, unknown> | Record<string, unknown> {
    return value instanceof Map || _.isPlainObject(value);
}

/**
 * Flatten one record: nested key-value fields become `<field>_<key>` entries
 */
export function flattenRecord(item: unknown): FlatRow {
    const record = toRecord(item);
    if (!record) {
        throw new ConfigError(ERROR_MESSAGES.FLATTEN_EXPECTS_RECORDS(typeof item));
    }

    const row: FlatRow = {};
    record.fieldNames().forEach(field => {
        const value = record.fieldValue(field);
        const nested = isNestedMap(value) ? toRecord(value) : null;

        if (!nested) {
            row[field] = value;
            return;
        }
        nested.fieldNames().forEach(key => {
            row[`${field}_${key}`] = nested.fieldValue(key);
        });
    });
    return row;
}

/**
 * Flatten every record and back-fill keys missing from a row with ''
 */
export function flattenRecords(data: readonly unknown[]): FlatRow[] {
    const rows = data.map(flattenRecord);
    const keys = _.uniq(_.flatMap(rows, row => Object.keys(row)));

    return rows.map(row => {
        keys.forEach(key => {
            if (!_.has(row, key)) row[key] = '';
        });
        return row;
    });
}
