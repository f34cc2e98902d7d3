import * as _ from 'lodash-es';
import type ExcelJS from 'exceljs';
import type { Logger } from 'pino';
import { DEFAULT_COLUMN_WIDTH, DISCOVERY_SCAN_LIMIT } from './constants';
import type { ColumnConfig } from './types';

// ============================================
// 1. RECORD ACCESSORS
// ============================================

/**
 * Uniform read access to one data item, whatever its concrete shape
 */
export interface RecordAccessor {
    fieldNames(): string[];
    fieldValue(name: string): unknown;
}

/**
 * Dynamic key-value row backed by a Map
 */
export class MapRecord implements RecordAccessor {
    constructor(private readonly row: ReadonlyMap<unknown, unknown>) {}

    fieldNames(): string[] {
        return Array.from(this.row.keys(), key => String(key));
    }

    fieldValue(name: string): unknown {
        if (this.row.has(name)) return this.row.get(name);
        const key = _.find(Array.from(this.row.keys()), candidate => String(candidate) === name);
        return _.isUndefined(key) ? undefined : this.row.get(key);
    }
}

/**
 * Plain object row or typed record (class instance). Own enumerable fields only.
 */
export class ObjectRecord implements RecordAccessor {
    constructor(private readonly item: object) {}

    fieldNames(): string[] {
        return Object.keys(this.item);
    }

    fieldValue(name: string): unknown {
        return Object.prototype.hasOwnProperty.call(this.item, name)
            ? _.get(this.item, [name])
            : undefined;
    }
}

function isKeyValueRow(item: unknown): boolean {
    return item instanceof Map || _.isPlainObject(item);
}

function isTypedRecord(item: unknown): item is object {
    return _.isObject(item)
        && !isKeyValueRow(item)
        && !_.isArray(item)
        && !_.isFunction(item)
        && !_.isDate(item);
}

/**
 * Wrap a data item in the accessor for its shape, or null when it has no fields
 */
export function toRecord(item: unknown): RecordAccessor | null {
    if (item instanceof Map) return new MapRecord(item);
    if (_.isObject(item) && !_.isArray(item) && !_.isFunction(item) && !_.isDate(item)) {
        return new ObjectRecord(item);
    }
    return null;
}

// ============================================
// 2. FIELD DISCOVERY
// ============================================

/**
 * Discover field names from bound data.
 * Typed records: fields of the first element. Key-value rows: union of keys over
 * the first rows, in first-seen order. Anything else yields no fields.
 */
export function discoverFields(data: unknown, logger?: Logger): string[] {
    if (!_.isArray(data) || _.isEmpty(data)) return [];

    const first: unknown = data[0];

    if (isTypedRecord(first)) {
        return toRecord(first)?.fieldNames() ?? [];
    }

    if (!isKeyValueRow(first)) {
        logger?.warn({ shape: typeof first }, 'cannot discover columns from data of this shape');
        return [];
    }

    const seen = new Set<string>();
    _.take(data, DISCOVERY_SCAN_LIMIT).forEach((row: unknown) => {
        if (!isKeyValueRow(row)) return;
        toRecord(row)?.fieldNames().forEach(name => seen.add(name));
    });

    return Array.from(seen);
}

/**
 * Explicit columns first, verbatim and in order, then every discovered field
 * not already configured with a default header and width
 */
export function mergeColumns(
    data: unknown,
    columns: readonly ColumnConfig[] = [],
    logger?: Logger
): ColumnConfig[] {
    if (_.isNil(data)) return [...columns];

    const configured = new Set(columns.map(col => col.fieldName));
    const discovered = discoverFields(data, logger)
        .filter(field => !configured.has(field))
        .map((field): ColumnConfig => ({
            fieldName: field,
            header: field,
            width: DEFAULT_COLUMN_WIDTH,
        }));

    return [...columns, ...discovered];
}

// ============================================
// 3. CELL VALUES
// ============================================

/**
 * Convert a data value to something a cell can hold
 */
export function toCellValue(value: unknown): ExcelJS.CellValue {
    if (_.isNil(value)) return '';
    if (_.isDate(value)) return value;
    if (_.isNumber(value)) return value;
    if (_.isString(value)) return value;
    if (_.isBoolean(value)) return value;
    if (typeof value === 'bigint') return value.toString();

    return JSON.stringify(value) ?? '';
}
