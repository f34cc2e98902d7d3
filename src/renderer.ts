import * as _ from 'lodash-es';
import type ExcelJS from 'exceljs';
import { ERROR_MESSAGES, MAX_COLUMNS, SHEET_PROTECTION } from './constants';
import { SectionEmitter, type EmitContext } from './emitter';
import { LayoutError } from './errors';
import { LayoutCursor, frameSection, type PlannedSection, type SheetPlan } from './layout';
import type { SectionFrame } from './types';

/**
 * Default every cell of the sheet to unlocked so that protection only affects
 * cells a section locks explicitly
 */
export function unlockColumns(worksheet: ExcelJS.Worksheet): void {
    for (let col = 1; col <= MAX_COLUMNS; col++) {
        worksheet.getColumn(col).style = { protection: { locked: false } };
    }
}

function assertSamePlacement(planned: PlannedSection, frame: SectionFrame): void {
    const { placement, section } = planned;
    if (placement.startRow !== frame.dataStartRow || placement.startCol !== frame.anchor.col) {
        throw new LayoutError(ERROR_MESSAGES.LAYOUT_MISMATCH(section.label));
    }
}

/**
 * Pass 2: emit every planned section of one sheet.
 * Anchors are re-derived with a fresh cursor and must agree with Pass 1.
 */
export async function renderSheet(worksheet: ExcelJS.Worksheet, plan: SheetPlan, context: EmitContext): Promise<void> {
    if (plan.usesLocks) {
        unlockColumns(worksheet);
    }

    const cursor = new LayoutCursor();
    const hiddenRows: number[] = [];

    plan.sections.forEach(planned => {
        const { section, columns, data, placement } = planned;
        const anchor = cursor.anchorFor(section);
        const frame = frameSection(section, columns, anchor);
        assertSamePlacement(planned, frame);

        const emitter = new SectionEmitter(worksheet, section, columns, frame, context, {
            onResolutionError: 'marker',
            applyWidth: (col, width) => {
                worksheet.getColumn(col).width = width;
            },
        });

        hiddenRows.push(...emitter.emitHeading());

        _.times(placement.dataLength, index => {
            const rowNumber = emitter.emitDataRow(index, data?.[index], plan.placements);
            if (emitter.isHiddenSection) hiddenRows.push(rowNumber);
        });

        const filter = emitter.autoFilterRange(placement.dataLength);
        if (filter) {
            if (worksheet.autoFilter) {
                context.logger.warn({ section: section.label, replaced: worksheet.autoFilter }, 'autofilter replaced');
            }
            worksheet.autoFilter = filter;
        }

        cursor.advance(frame, placement.dataLength);
    });

    // Visibility last: rows must exist first
    _.uniq(hiddenRows).forEach(rowNumber => {
        worksheet.getRow(rowNumber).hidden = true;
    });

    if (plan.usesLocks) {
        await worksheet.protect('', SHEET_PROTECTION);
    }
}
