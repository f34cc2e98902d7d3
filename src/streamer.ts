import * as _ from 'lodash-es';
import ExcelJS from 'exceljs';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { Logger } from 'pino';
import { mergeColumns } from './columns';
import { ERROR_MESSAGES, SHEET_PROTECTION } from './constants';
import { SectionEmitter, type EmitContext } from './emitter';
import { BindingError, IOError, errorMessage } from './errors';
import {
    LayoutCursor,
    PlacementTable,
    fieldOffsets,
    frameSection,
    resolveDataLength,
    sheetUsesLocks,
    type DataSource,
} from './layout';
import { unlockColumns } from './renderer';
import type { Section, SheetBuilder } from './section';
import type { ColumnConfig } from './types';

// ============================================
// TYPES
// ============================================

export type StreamState = 'idle' | 'advancing' | 'awaiting-first-write' | 'writing' | 'closed';

export interface StreamSource {
    sheets: readonly SheetBuilder[];
    dataFor: DataSource;
    context: EmitContext;
    flushEvery: number;
}

export interface StreamStats {
    state: StreamState;
    /** Data rows emitted so far, static sections included */
    rowsWritten: number;
    flushes: number;
}

interface OpenSheet {
    builder: SheetBuilder;
    worksheet: ExcelJS.Worksheet;
    cursor: LayoutCursor;
    placements: PlacementTable;
    usesLocks: boolean;
    lastRow: number;
    committed: boolean;
}

interface ActiveSection {
    section: Section;
    emitter: SectionEmitter;
    rowsWritten: number;
}

interface SectionPosition {
    sheetIndex: number;
    sectionIndex: number;
}

// ============================================
// STREAMER
// ============================================

/**
 * Sequential writer: sections are emitted in declaration order, static
 * sections on their own, streaming sections from batches passed to `write`.
 * Rows are committed to the output every `flushEvery` rows.
 */
export class ReportStreamer {
    private status: StreamState = 'idle';
    private readonly workbook: ExcelJS.stream.xlsx.WorkbookWriter;
    private readonly logger: Logger;
    private readonly sinkDone: Promise<void>;
    private sinkError: unknown;

    private sheetIndex = 0;
    private sectionIndex = 0;
    private sheet: OpenSheet | undefined;
    private active: ActiveSection | undefined;
    private busy = false;

    private rowsWritten = 0;
    private rowsSinceFlush = 0;
    private flushes = 0;

    constructor(private readonly source: StreamSource, stream: Writable) {
        this.logger = source.context.logger;
        this.workbook = new ExcelJS.stream.xlsx.WorkbookWriter({
            stream,
            useStyles: true,
            useSharedStrings: false,
        });

        // Observed from the start: the sink can fail on any flush
        this.sinkDone = finished(stream, { readable: false });
        this.sinkDone.catch((err: unknown) => {
            this.sinkError = err;
            this.logger.error({ err: errorMessage(err) }, 'stream output failed');
        });
    }

    get state(): StreamState {
        return this.status;
    }

    get stats(): StreamStats {
        return { state: this.status, rowsWritten: this.rowsWritten, flushes: this.flushes };
    }

    /**
     * Render leading static sections and stop at the first section waiting for data
     */
    async start(): Promise<void> {
        if (this.status !== 'idle') {
            throw new BindingError(ERROR_MESSAGES.STREAM_ALREADY_STARTED);
        }
        await this.advanceStatic();
    }

    /**
     * Append a batch to `sectionId`, which must be the current section or a later one
     */
    async write(sectionId: string, batch: readonly unknown[]): Promise<void> {
        this.assertUsable();
        this.assertSinkHealthy();
        this.busy = true;
        try {
            const target = this.locate(sectionId);
            if (target.sheetIndex !== this.sheetIndex || target.sectionIndex !== this.sectionIndex) {
                await this.advanceTo(target);
            }

            const sheet = this.openSheet();
            if (!this.active) {
                const section = sheet.builder.sections[this.sectionIndex];
                const bound = this.source.dataFor(section);
                const columns = Object.freeze(mergeColumns(bound ?? batch, section.columns, this.logger));
                this.active = this.beginSection(sheet, section, columns);
                if (bound) this.appendRows(sheet, this.active, bound);
                this.transition('writing', section);
            }

            this.appendRows(sheet, this.active, batch);
        } finally {
            this.busy = false;
        }
    }

    /**
     * Finish the current section, render everything left and write the document
     */
    async close(): Promise<void> {
        this.assertUsable();
        this.busy = true;
        try {
            if (this.status === 'awaiting-first-write' || this.status === 'writing') {
                this.leaveCurrent();
            }
            await this.renderUntil({ sheetIndex: this.source.sheets.length, sectionIndex: 0 });

            try {
                await Promise.all([this.workbook.commit(), this.sinkDone]);
            } catch (err) {
                this.transition('closed');
                throw new IOError(ERROR_MESSAGES.WRITE_FAILED(errorMessage(err)), { cause: err });
            }

            this.transition('closed');
            this.logger.info(
                { sheets: this.source.sheets.length, rows: this.rowsWritten, flushes: this.flushes },
                'stream closed'
            );
        } finally {
            this.busy = false;
        }
    }

    // ============================================
    // NAVIGATION
    // ============================================

    private assertUsable(): void {
        if (this.status === 'idle') throw new BindingError(ERROR_MESSAGES.STREAM_NOT_STARTED);
        if (this.status === 'closed') throw new BindingError(ERROR_MESSAGES.STREAM_CLOSED);
        if (this.busy) throw new BindingError(ERROR_MESSAGES.STREAM_BUSY);
    }

    private assertSinkHealthy(): void {
        if (!_.isUndefined(this.sinkError)) {
            const err = this.sinkError;
            throw new IOError(ERROR_MESSAGES.WRITE_FAILED(errorMessage(err)), { cause: err });
        }
    }

    private transition(next: StreamState, section?: Section): void {
        this.logger.debug({ from: this.status, to: next, section: section?.label }, 'stream state');
        this.status = next;
    }

    /**
     * Position of `sectionId` among the sections not yet rendered
     */
    private locate(sectionId: string): SectionPosition {
        const pending = this.status === 'awaiting-first-write' || this.status === 'writing';
        if (pending) {
            const { sheets } = this.source;
            for (let sheetIndex = this.sheetIndex; sheetIndex < sheets.length; sheetIndex++) {
                const from = sheetIndex === this.sheetIndex ? this.sectionIndex : 0;
                const sectionIndex = _.findIndex(sheets[sheetIndex].sections, sec => sec.id === sectionId, from);
                if (sectionIndex >= 0) return { sheetIndex, sectionIndex };
            }
        }
        throw new BindingError(ERROR_MESSAGES.STREAM_SECTION_PASSED(sectionId));
    }

    private async advanceTo(target: SectionPosition): Promise<void> {
        this.leaveCurrent();
        this.transition('advancing');
        await this.renderUntil(target);
        this.openSheet();
        this.transition('awaiting-first-write', this.source.sheets[target.sheetIndex].sections[target.sectionIndex]);
    }

    /**
     * Render static sections from the current position until one waits for data
     */
    private async advanceStatic(): Promise<void> {
        this.transition('advancing');
        const { sheets } = this.source;

        while (this.sheetIndex < sheets.length) {
            const sheet = this.openSheet();
            const { sections } = sheet.builder;

            while (this.sectionIndex < sections.length) {
                const section = sections[this.sectionIndex];
                if (!this.isStatic(section)) {
                    this.transition('awaiting-first-write', section);
                    return;
                }
                this.renderWhole(sheet, section);
                this.sectionIndex++;
            }
            await this.finishSheet(sheet);
        }
    }

    /**
     * Render every section before `target` as it stands, closing sheets on the way
     */
    private async renderUntil(target: SectionPosition): Promise<void> {
        while (this.sheetIndex < target.sheetIndex
            || (this.sheetIndex === target.sheetIndex && this.sectionIndex < target.sectionIndex)) {
            const sheet = this.openSheet();
            const { sections } = sheet.builder;

            if (this.sectionIndex >= sections.length) {
                await this.finishSheet(sheet);
                continue;
            }
            this.renderWhole(sheet, sections[this.sectionIndex]);
            this.sectionIndex++;
        }
    }

    /**
     * Close the section at the current position, rendering it if it never got data
     */
    private leaveCurrent(): void {
        const sheet = this.openSheet();
        if (this.active) {
            this.endSection(sheet, this.active);
            this.active = undefined;
        } else {
            this.renderWhole(sheet, sheet.builder.sections[this.sectionIndex]);
        }
        this.sectionIndex++;
    }

    /**
     * Rendered without waiting for `write`. Title-only sections never take data rows.
     */
    private isStatic(section: Section): boolean {
        return section.kind === 'title'
            || !_.isUndefined(this.source.dataFor(section))
            || !section.id
            || !_.isEmpty(section.sourceSections);
    }

    // ============================================
    // SHEETS
    // ============================================

    private openSheet(): OpenSheet {
        if (this.sheet) return this.sheet;

        const builder = this.source.sheets[this.sheetIndex];
        const worksheet = this.workbook.addWorksheet(builder.name);
        const usesLocks = sheetUsesLocks(builder.sections);
        if (usesLocks) {
            unlockColumns(worksheet);
        }

        this.sheet = {
            builder,
            worksheet,
            cursor: new LayoutCursor(true),
            placements: new PlacementTable(),
            usesLocks,
            lastRow: 0,
            committed: false,
        };
        this.logger.debug({ sheet: builder.name }, 'sheet opened');
        return this.sheet;
    }

    private async finishSheet(sheet: OpenSheet): Promise<void> {
        if (sheet.usesLocks) {
            await sheet.worksheet.protect('', SHEET_PROTECTION);
        }
        sheet.worksheet.commit();

        this.sheet = undefined;
        this.sheetIndex++;
        this.sectionIndex = 0;
    }

    // ============================================
    // SECTIONS
    // ============================================

    private renderWhole(sheet: OpenSheet, section: Section): void {
        const data = this.source.dataFor(section);
        const columns = Object.freeze(mergeColumns(data, section.columns, this.logger));
        const active = this.beginSection(sheet, section, columns);

        const length = resolveDataLength(section, data, sheet.placements);
        const rows = _.times(length, index => data?.[index]);
        this.appendRows(sheet, active, rows);
        this.endSection(sheet, active);
    }

    /**
     * Title, hidden metadata row and header at the next free row
     */
    private beginSection(sheet: OpenSheet, section: Section, columns: readonly ColumnConfig[]): ActiveSection {
        if (section.direction === 'horizontal' || section.position) {
            this.logger.warn(
                { section: section.label, direction: section.direction, position: section.position },
                'streaming lays sections out vertically; direction and position ignored'
            );
        }

        const anchor = sheet.cursor.anchorFor(section);
        const frame = frameSection(section, columns, anchor);
        const emitter = new SectionEmitter(sheet.worksheet, section, columns, frame, this.source.context, {
            onResolutionError: 'throw',
            applyWidth: (col, width) => {
                if (sheet.committed) {
                    this.logger.debug({ section: section.label, col }, 'column width after first flush ignored');
                    return;
                }
                sheet.worksheet.getColumn(col).width = width;
            },
        });

        emitter.emitHeading().forEach(rowNumber => {
            sheet.worksheet.getRow(rowNumber).hidden = true;
        });
        _.range(anchor.row, frame.dataStartRow).forEach(rowNumber => this.rowEmitted(sheet, rowNumber));

        this.recordPlacement(sheet, emitter, 0);
        return { section, emitter, rowsWritten: 0 };
    }

    private appendRows(sheet: OpenSheet, active: ActiveSection, items: readonly unknown[]): void {
        items.forEach(item => {
            const rowNumber = active.emitter.emitDataRow(active.rowsWritten, item, sheet.placements);
            if (active.emitter.isHiddenSection) {
                sheet.worksheet.getRow(rowNumber).hidden = true;
            }
            active.rowsWritten++;
            this.rowsWritten++;
            this.rowEmitted(sheet, rowNumber);
        });
    }

    private endSection(sheet: OpenSheet, active: ActiveSection): void {
        const { emitter, rowsWritten } = active;
        this.recordPlacement(sheet, emitter, rowsWritten);

        const filter = emitter.autoFilterRange(rowsWritten);
        if (filter) {
            if (sheet.worksheet.autoFilter) {
                this.logger.warn({ section: active.section.label, replaced: sheet.worksheet.autoFilter }, 'autofilter replaced');
            }
            sheet.worksheet.autoFilter = filter;
        }

        sheet.cursor.advance(emitter.frame, rowsWritten);
        this.logger.debug({ section: active.section.label, rows: rowsWritten }, 'section finished');
    }

    private recordPlacement(sheet: OpenSheet, emitter: SectionEmitter, dataLength: number): void {
        const { section, frame, columns } = emitter;
        if (!section.id) return;

        sheet.placements.record(section.id, {
            sectionId: section.id,
            startRow: frame.dataStartRow,
            startCol: frame.anchor.col,
            fieldOffsets: fieldOffsets(columns),
            dataLength,
        });
    }

    // ============================================
    // FLUSHING
    // ============================================

    private rowEmitted(sheet: OpenSheet, rowNumber: number): void {
        sheet.lastRow = Math.max(sheet.lastRow, rowNumber);
        this.rowsSinceFlush++;

        if (this.rowsSinceFlush >= this.source.flushEvery) {
            sheet.worksheet.getRow(sheet.lastRow).commit();
            sheet.committed = true;
            this.rowsSinceFlush = 0;
            this.flushes++;
            this.logger.debug({ sheet: sheet.builder.name, row: sheet.lastRow }, 'rows flushed');
        }
    }
}
