import type { WorksheetProtection } from 'exceljs';
import type { SectionDirection, SectionType } from './types';

// ============================================
// SECTION CONSTANTS
// ============================================

export const SECTION_TYPES = ['full', 'title', 'hidden'] as const satisfies readonly SectionType[];

export const SECTION_DIRECTIONS = ['vertical', 'horizontal'] as const satisfies readonly SectionDirection[];

// ============================================
// LAYOUT CONSTANTS
// ============================================

/** Last column of an OOXML sheet (XFD) */
export const MAX_COLUMNS = 16384;

/** Rows inspected when unioning keys of key-value rows */
export const DISCOVERY_SCAN_LIMIT = 50;

export const DEFAULT_COLUMN_WIDTH = 20;

export const DEFAULT_FLUSH_EVERY = 1000;

// ============================================
// STYLE CONSTANTS
// ============================================

export const DEFAULT_LOCKED_COLOR = 'E0E0E0';

/** Fill of hidden metadata rows and hidden sections */
export const HIDDEN_FILL_COLOR = 'FFFF00';

/**
 * Sheet protection applied when any cell is locked
 */
export const SHEET_PROTECTION: Partial<WorksheetProtection> = {
    selectLockedCells: true,
    selectUnlockedCells: true,
    formatCells: false,
    formatColumns: true,
    formatRows: true,
    insertColumns: false,
    insertRows: false,
    insertHyperlinks: false,
    deleteColumns: false,
    deleteRows: false,
    sort: false,
    autoFilter: true,
    pivotTables: false,
};

// ============================================
// FORMULA CONSTANTS
// ============================================

/** Value shown by a comparison cell when the two sides differ */
export const DIFF_MARKER = 'Diff';

export const CELL_REF_REGEX = /^([A-Z]{1,3})([1-9]\d*)$/i;

// ============================================
// ERROR MESSAGES
// ============================================

export const ERROR_MESSAGES = {
    EMPTY_TEMPLATE: 'Template is empty',
    TEMPLATE_PARSE_FAILED: (msg: string) => `Failed to parse template: ${msg}`,
    TEMPLATE_INVALID: (msg: string) => `Invalid template: ${msg}`,
    DUPLICATE_SHEET: (name: string) => `Sheet '${name}' already exists`,
    DUPLICATE_SECTION: (id: string) => `Section id '${id}' is already used in this workbook`,
    INVALID_FLUSH_EVERY: (value: number) => `flushEvery must be a positive integer, got ${value}`,
    UNKNOWN_SECTION: (id: string) => `No section with id '${id}'`,
    SECTION_NOT_PLACED: (id: string) => `Section '${id}' has no placement (references may only point to earlier sections)`,
    FIELD_NOT_PLACED: (field: string, id: string) => `Field '${field}' not found in section '${id}'`,
    COMPARE_AGAINST_REQUIRED: (field: string) => `compareAgainst is required for comparison column '${field}'`,
    INVALID_POSITION: (position: string) => `Cannot parse position '${position}'`,
    LAYOUT_MISMATCH: (label: string) => `Section '${label}' was placed differently in the emission pass`,
    MERGE_FAILED: (range: string, msg: string) => `Cannot merge ${range}: ${msg}`,
    STREAM_NOT_STARTED: 'Stream is not started',
    STREAM_ALREADY_STARTED: 'Stream is already started',
    STREAM_CLOSED: 'Stream is closed',
    STREAM_BUSY: 'A previous write on this stream has not finished',
    STREAM_SECTION_PASSED: (id: string) => `Section '${id}' not found in remaining sections (already passed or does not exist)`,
    FLATTEN_EXPECTS_RECORDS: (shape: string) => `Expected records to flatten, got ${shape}`,
    UNBOUND_DATA: (id: string) => `Data for section '${id}' must be an array`,
    NO_SHEETS: 'No sheets to export',
    WRITE_FAILED: (msg: string) => `Failed to write output: ${msg}`,
} as const;
