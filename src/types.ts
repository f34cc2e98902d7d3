import type { Logger } from 'pino';

// ============================================
// SECTION KINDS
// ============================================

/**
 * Section kinds: full (title, header, data), title only, or hidden
 */
export type SectionType = 'full' | 'title' | 'hidden';

export type SectionDirection = 'vertical' | 'horizontal';

/**
 * Cell roles that carry their own style cascade
 */
export type StyleRole = 'title' | 'header' | 'data';

// ============================================
// STYLE INTERFACES
// ============================================

export interface FontTemplate {
    bold?: boolean;
    /** Hex color, `#` optional */
    color?: string;
}

export interface FillTemplate {
    color: string;
}

export interface AlignmentTemplate {
    horizontal?: 'left' | 'center' | 'right';
    vertical?: 'top' | 'center' | 'bottom';
}

/**
 * Authoring-level style. Each level of the cascade only overrides what it sets.
 */
export interface StyleTemplate {
    font?: FontTemplate;
    fill?: FillTemplate;
    alignment?: AlignmentTemplate;
    locked?: boolean;
}

// ============================================
// COLUMN & SECTION CONFIG
// ============================================

export type Formatter = (value: unknown) => unknown;

/**
 * Points at a field of another, already placed section
 */
export interface CompareRef {
    sectionId: string;
    fieldName: string;
}

export interface ColumnConfig {
    /** Lookup key into a data item */
    fieldName: string;
    header?: string;
    width?: number;
    height?: number;
    /** Overrides the section lock for this column */
    locked?: boolean;
    formatter?: Formatter;
    /** Name of a formatter registered on the exporter */
    formatterName?: string;
    /** Adds an always-locked, hidden metadata row above the header */
    hiddenFieldName?: string;
    compareWith?: CompareRef;
    compareAgainst?: CompareRef;
}

export interface SectionConfig {
    /** Required for late data binding, streaming and cross-references */
    id?: string;
    title?: string;
    type?: SectionType;
    direction?: SectionDirection;
    /** Explicit anchor cell, e.g. "C5" */
    position?: string;
    locked?: boolean;
    showHeader?: boolean;
    /** Columns spanned by a title-only section */
    colSpan?: number;
    /** Sections whose resolved row count this section mirrors */
    sourceSections?: string[];
    titleStyle?: StyleTemplate;
    headerStyle?: StyleTemplate;
    dataStyle?: StyleTemplate;
    titleHeight?: number;
    headerHeight?: number;
    dataHeight?: number;
    hasFilter?: boolean;
    columns?: ColumnConfig[];
    data?: readonly unknown[];
}

export interface SheetTemplate {
    name: string;
    sections: SectionConfig[];
}

export interface ReportTemplate {
    sheets: SheetTemplate[];
}

// ============================================
// LAYOUT INTERFACES
// ============================================

/**
 * 1-based sheet coordinates
 */
export interface CellAddress {
    row: number;
    col: number;
}

/**
 * Resolved coordinates of a section. `startRow` is the first DATA row.
 */
export interface SectionPlacement {
    sectionId?: string;
    startRow: number;
    startCol: number;
    fieldOffsets: ReadonlyMap<string, number>;
    dataLength: number;
}

/**
 * Row layout of one section, derived from its anchor
 */
export interface SectionFrame {
    anchor: CellAddress;
    titleRow?: number;
    hiddenRow?: number;
    headerRow?: number;
    dataStartRow: number;
    /** Columns occupied, used by the horizontal cursor */
    span: number;
}

// ============================================
// OPTIONS
// ============================================

/**
 * Options for building and streaming reports
 */
export interface ExporterOptions {
    logger?: Logger;
    /**
     * Streaming: commit buffered rows every N rows.
     * @default 1000
     */
    flushEvery?: number;
    /** Workbook-wide styles layered between the built-in defaults and each section's style */
    defaultStyles?: Partial<Record<StyleRole, StyleTemplate>>;
    /**
     * Fill applied to locked cells that have none
     * @default 'E0E0E0'
     */
    lockedFillColor?: string;
}
