import * as _ from 'lodash-es';
import type { Logger } from 'pino';
import { mergeColumns } from './columns';
import { CELL_REF_REGEX, DIFF_MARKER, ERROR_MESSAGES } from './constants';
import { LayoutError, ResolutionError } from './errors';
import type { Section } from './section';
import type { CellAddress, ColumnConfig, SectionFrame, SectionPlacement } from './types';

// ============================================
// 1. CELL ADDRESSES
// ============================================

export function columnLetterToNumber(letter: string): number {
    const upperLetter = letter.toUpperCase();
    let num = 0;
    for (let i = 0; i < upperLetter.length; i++) {
        num = num * 26 + (upperLetter.charCodeAt(i) - 64);
    }
    return num;
}

export function columnNumberToLetter(num: number): string {
    let letter = '';
    while (num > 0) {
        const mod = (num - 1) % 26;
        letter = String.fromCharCode(65 + mod) + letter;
        num = Math.floor((num - mod) / 26);
    }
    return letter;
}

export function cellName(col: number, row: number): string {
    return `${columnNumberToLetter(col)}${row}`;
}

/**
 * Parse an A1-style anchor such as "C5"
 */
export function parsePosition(position: string): CellAddress {
    const match = _.trim(position).match(CELL_REF_REGEX);
    if (!match) {
        throw new LayoutError(ERROR_MESSAGES.INVALID_POSITION(position));
    }
    return {
        col: columnLetterToNumber(match[1]),
        row: parseInt(match[2], 10),
    };
}

// ============================================
// 2. PLACEMENT TABLE
// ============================================

/**
 * Placements of one sheet, filled in declaration order during Pass 1.
 * Lookups fail closed: a missing section or field is an error, never a zero.
 */
export class PlacementTable {
    private readonly entries = new Map<string, SectionPlacement>();

    record(sectionId: string, placement: SectionPlacement): void {
        this.entries.set(sectionId, placement);
    }

    has(sectionId: string): boolean {
        return this.entries.has(sectionId);
    }

    get(sectionId: string): SectionPlacement {
        const placement = this.entries.get(sectionId);
        if (!placement) {
            throw new ResolutionError(ERROR_MESSAGES.SECTION_NOT_PLACED(sectionId));
        }
        return placement;
    }

    /**
     * Address of `fieldName` in the `rowOffset`-th data row of a placed section
     */
    resolveCell(sectionId: string, fieldName: string, rowOffset: number): string {
        const placement = this.get(sectionId);
        const colOffset = placement.fieldOffsets.get(fieldName);
        if (_.isUndefined(colOffset)) {
            throw new ResolutionError(ERROR_MESSAGES.FIELD_NOT_PLACED(fieldName, sectionId));
        }
        return cellName(placement.startCol + colOffset, placement.startRow + rowOffset);
    }
}

/**
 * Equality-diff formula between two placed sections at the same data row
 */
export function diffFormula(column: ColumnConfig, rowOffset: number, placements: PlacementTable): string {
    const { compareWith, compareAgainst } = column;
    if (!compareWith || !compareAgainst) {
        throw new ResolutionError(ERROR_MESSAGES.COMPARE_AGAINST_REQUIRED(column.fieldName));
    }

    const cellA = placements.resolveCell(compareWith.sectionId, compareWith.fieldName, rowOffset);
    const cellB = placements.resolveCell(compareAgainst.sectionId, compareAgainst.fieldName, rowOffset);

    return `IF(${cellA}<>${cellB}, "${DIFF_MARKER}", "")`;
}

// ============================================
// 3. CURSOR & FRAMES
// ============================================

export function hasHiddenFields(columns: readonly ColumnConfig[]): boolean {
    return _.some(columns, col => !!col.hiddenFieldName);
}

/**
 * Columns covered by a title-only section: explicit span, else all columns, at least one
 */
export function titleSpan(section: Section, columnCount: number): number {
    if (section.colSpan && section.colSpan > 1) return section.colSpan;
    return Math.max(columnCount, 1);
}

/**
 * Shared placement cursors. Vertical sections stack at the next free row in
 * column A; horizontal sections sit on row 1 at the next free column.
 */
export class LayoutCursor {
    private nextRow = 1;
    private nextCol = 1;

    /**
     * @param verticalOnly - ignore direction and explicit positions (streaming)
     */
    constructor(private readonly verticalOnly = false) {}

    get row(): number {
        return this.nextRow;
    }

    anchorFor(section: Section): CellAddress {
        if (!this.verticalOnly) {
            if (section.position) return parsePosition(section.position);
            if (section.direction === 'horizontal') return { row: 1, col: this.nextCol };
        }
        return { row: this.nextRow, col: 1 };
    }

    advance(frame: SectionFrame, dataLength: number): void {
        this.nextRow = Math.max(this.nextRow, frame.dataStartRow + dataLength);
        this.nextCol = frame.anchor.col + frame.span;
    }
}

/**
 * Rows used by the title, hidden metadata and header of a section anchored at `anchor`
 */
export function frameSection(section: Section, columns: readonly ColumnConfig[], anchor: CellAddress): SectionFrame {
    let row = anchor.row;

    if (section.kind === 'title') {
        const titleRow = section.title ? row++ : undefined;
        return { anchor, titleRow, dataStartRow: row, span: titleSpan(section, columns.length) };
    }

    const titleRow = section.title ? row++ : undefined;
    const hiddenRow = hasHiddenFields(columns) ? row++ : undefined;
    const headerRow = section.showHeader ? row++ : undefined;

    return { anchor, titleRow, hiddenRow, headerRow, dataStartRow: row, span: columns.length };
}

export function fieldOffsets(columns: readonly ColumnConfig[]): Map<string, number> {
    return new Map(columns.map((col, index) => [col.fieldName, index]));
}

// ============================================
// 4. PASS 1
// ============================================

export type DataSource = (section: Section) => readonly unknown[] | undefined;

export interface PlannedSection {
    section: Section;
    /** Explicit plus discovered columns, frozen for both passes */
    columns: readonly ColumnConfig[];
    data: readonly unknown[] | undefined;
    placement: SectionPlacement;
}

export interface SheetPlan {
    sections: PlannedSection[];
    placements: PlacementTable;
    usesLocks: boolean;
}

/**
 * Rows of data a section renders: its own data, else the resolved length of its first source
 */
export function resolveDataLength(
    section: Section,
    data: readonly unknown[] | undefined,
    placements: PlacementTable
): number {
    if (section.kind === 'title') return 0;
    if (data) return data.length;

    const source = _.head(section.sourceSections);
    return source ? placements.get(source).dataLength : 0;
}

/**
 * True when any cell of the sheet will be locked
 */
export function sheetUsesLocks(sections: readonly Section[]): boolean {
    return _.some(sections, sec =>
        sec.isLocked
        || sec.kind === 'hidden'
        || _.some(sec.columns, col => col.locked === true || !!col.hiddenFieldName)
    );
}

/**
 * Pass 1: resolve columns, anchors and data lengths of every section in order
 */
export function planSheet(sections: readonly Section[], dataFor: DataSource, logger?: Logger): SheetPlan {
    const placements = new PlacementTable();
    const cursor = new LayoutCursor();

    const planned = sections.map((section): PlannedSection => {
        const data = dataFor(section);
        const columns = Object.freeze(mergeColumns(data, section.columns, logger));
        const anchor = cursor.anchorFor(section);
        const frame = frameSection(section, columns, anchor);
        const dataLength = resolveDataLength(section, data, placements);

        const placement: SectionPlacement = {
            sectionId: section.id,
            startRow: frame.dataStartRow,
            startCol: anchor.col,
            fieldOffsets: fieldOffsets(columns),
            dataLength,
        };
        if (section.id) {
            placements.record(section.id, placement);
        }
        cursor.advance(frame, dataLength);

        logger?.debug(
            { section: section.label, row: placement.startRow, col: placement.startCol, dataLength },
            'section placed'
        );
        return { section, columns, data, placement };
    });

    return { sections: planned, placements, usesLocks: sheetUsesLocks(sections) };
}
