import * as _ from 'lodash-es';
import type ExcelJS from 'exceljs';
import type { Logger } from 'pino';
import { toCellValue, toRecord } from './columns';
import { ERROR_MESSAGES } from './constants';
import { LayoutError, ResolutionError, errorMessage } from './errors';
import { cellName, diffFormula, type PlacementTable } from './layout';
import type { Section } from './section';
import { isColumnLocked, type StyleResolver } from './styles';
import type { ColumnConfig, Formatter, SectionFrame } from './types';

// ============================================
// CONTEXT
// ============================================

export interface EmitContext {
    styles: StyleResolver;
    formatters: ReadonlyMap<string, Formatter>;
    logger: Logger;
}

export interface EmitOptions {
    /** Batch output marks unresolvable comparison cells; streaming fails */
    onResolutionError: 'marker' | 'throw';
    applyWidth: (column: number, width: number) => void;
}

/**
 * Inline formatter wins over a named one
 */
export function formatterFor(column: ColumnConfig, formatters: ReadonlyMap<string, Formatter>): Formatter | undefined {
    if (column.formatter) return column.formatter;
    return column.formatterName ? formatters.get(column.formatterName) : undefined;
}

// ============================================
// SECTION EMITTER
// ============================================

/**
 * Writes one section's cells at the coordinates of its frame
 */
export class SectionEmitter {
    private readonly formatters: (Formatter | undefined)[];
    private readonly dataStyles: Partial<ExcelJS.Style>[];
    private readonly dataRowHeight: number;

    constructor(
        private readonly worksheet: ExcelJS.Worksheet,
        readonly section: Section,
        readonly columns: readonly ColumnConfig[],
        readonly frame: SectionFrame,
        private readonly context: EmitContext,
        private readonly options: EmitOptions
    ) {
        this.formatters = columns.map(col => {
            const formatter = formatterFor(col, context.formatters);
            if (!formatter && col.formatterName) {
                context.logger.warn(
                    { section: section.label, field: col.fieldName, formatter: col.formatterName },
                    'formatter is not registered'
                );
            }
            return formatter;
        });

        this.dataStyles = columns.map(col =>
            context.styles.cellStyle('data', section.dataStyle, this.lockFor(col), this.isHiddenSection)
        );

        this.dataRowHeight = _.max([section.dataHeight ?? 0, ...columns.map(col => col.height ?? 0)]) ?? 0;
    }

    get isHiddenSection(): boolean {
        return this.section.kind === 'hidden';
    }

    /**
     * Hidden sections are locked throughout; otherwise the column lock wins over the section lock
     */
    lockFor(column?: ColumnConfig): boolean {
        if (this.isHiddenSection) return true;
        return column ? isColumnLocked(column, this.section.isLocked) : this.section.isLocked;
    }

    /**
     * Title, hidden metadata row and header. Returns the rows to hide.
     */
    emitHeading(): number[] {
        const { frame } = this;
        const hidden: number[] = [];

        if (!_.isUndefined(frame.titleRow)) {
            this.emitTitle(frame.titleRow);
        }
        if (!_.isUndefined(frame.hiddenRow)) {
            this.emitMetadataRow(frame.hiddenRow);
            hidden.push(frame.hiddenRow);
        }
        if (!_.isUndefined(frame.headerRow)) {
            this.emitHeader(frame.headerRow);
        }

        if (this.isHiddenSection) {
            hidden.push(..._.range(frame.anchor.row, frame.dataStartRow));
        }
        return _.uniq(hidden);
    }

    /**
     * Write the `rowIndex`-th data row. Returns its sheet row number.
     */
    emitDataRow(rowIndex: number, item: unknown, placements: PlacementTable): number {
        const rowNumber = this.frame.dataStartRow + rowIndex;
        const row = this.worksheet.getRow(rowNumber);
        const record = _.isUndefined(item) ? null : toRecord(item);

        this.columns.forEach((col, j) => {
            const cell = row.getCell(this.frame.anchor.col + j);

            if (col.compareWith) {
                cell.value = this.comparisonValue(col, rowIndex, placements);
            } else if (record) {
                const raw = record.fieldValue(col.fieldName);
                const formatter = this.formatters[j];
                cell.value = toCellValue(formatter ? formatter(raw) : raw);
            }

            cell.style = this.dataStyles[j];
        });

        if (this.dataRowHeight > 0) {
            row.height = this.dataRowHeight;
        }
        return rowNumber;
    }

    /**
     * Header-to-last-row range when the section asks for a filter
     */
    autoFilterRange(dataLength: number): string | undefined {
        const { frame, columns } = this;
        if (!this.section.hasFilter || _.isUndefined(frame.headerRow) || _.isEmpty(columns)) {
            return undefined;
        }
        const lastRow = Math.max(frame.headerRow, frame.dataStartRow + dataLength - 1);
        return `${cellName(frame.anchor.col, frame.headerRow)}:${cellName(frame.anchor.col + columns.length - 1, lastRow)}`;
    }

    private comparisonValue(col: ColumnConfig, rowIndex: number, placements: PlacementTable): ExcelJS.CellValue {
        try {
            const formula: ExcelJS.CellFormulaValue = {
                formula: diffFormula(col, rowIndex, placements),
                date1904: false,
            };
            return formula;
        } catch (err) {
            if (!(err instanceof ResolutionError) || this.options.onResolutionError === 'throw') {
                throw err;
            }
            this.context.logger.warn(
                { section: this.section.label, field: col.fieldName, err: err.message },
                'comparison column cannot be resolved'
            );
            return `#ERROR: ${err.message}`;
        }
    }

    private emitTitle(rowNumber: number): void {
        const { section, frame } = this;
        const span = section.kind === 'title' ? frame.span : Math.max(this.columns.length, 1);
        const style = this.context.styles.cellStyle('title', section.titleStyle, this.lockFor());
        const row = this.worksheet.getRow(rowNumber);
        const first = frame.anchor.col;

        row.getCell(first).value = section.title ?? '';

        if (span > 1) {
            this.merge(rowNumber, first, first + span - 1);
        }
        _.range(first, first + span).forEach(col => {
            row.getCell(col).style = style;
        });

        if (section.titleHeight && section.titleHeight > 0) {
            row.height = section.titleHeight;
        }
    }

    private emitMetadataRow(rowNumber: number): void {
        const style = this.context.styles.metadataStyle();
        const row = this.worksheet.getRow(rowNumber);

        this.columns.forEach((col, j) => {
            const cell = row.getCell(this.frame.anchor.col + j);
            cell.value = col.hiddenFieldName ?? '';
            cell.style = style;
        });
    }

    private emitHeader(rowNumber: number): void {
        const { section, frame } = this;
        const row = this.worksheet.getRow(rowNumber);

        this.columns.forEach((col, j) => {
            const colNumber = frame.anchor.col + j;
            const cell = row.getCell(colNumber);
            cell.value = col.header ?? col.fieldName;
            cell.style = this.context.styles.cellStyle('header', section.headerStyle, this.lockFor(col), this.isHiddenSection);

            if (col.width && col.width > 0) {
                this.options.applyWidth(colNumber, col.width);
            }
        });

        if (section.headerHeight && section.headerHeight > 0) {
            row.height = section.headerHeight;
        }
    }

    private merge(rowNumber: number, fromCol: number, toCol: number): void {
        try {
            this.worksheet.mergeCells(rowNumber, fromCol, rowNumber, toCol);
        } catch (err) {
            const range = `${cellName(fromCol, rowNumber)}:${cellName(toCol, rowNumber)}`;
            throw new LayoutError(ERROR_MESSAGES.MERGE_FAILED(range, errorMessage(err)), { cause: err });
        }
    }
}
