import * as _ from 'lodash-es';
import ExcelJS from 'exceljs';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { toCellValue, toRecord } from './columns';
import { formatterFor } from './emitter';
import type { PlannedSection, SheetPlan } from './layout';
import type { Formatter } from './types';

const CSV_SHEET = 'csv';

/**
 * Lines for one section: title, header, then one line per data row.
 * Comparison columns stay empty.
 */
function sectionLines(planned: PlannedSection, formatters: ReadonlyMap<string, Formatter>): ExcelJS.CellValue[][] {
    const { section, columns, data, placement } = planned;
    const lines: ExcelJS.CellValue[][] = [];

    if (section.title) {
        lines.push([section.title]);
    }
    if (section.kind === 'title') {
        return lines;
    }
    if (section.showHeader && !_.isEmpty(columns)) {
        lines.push(columns.map(col => col.header ?? col.fieldName));
    }

    const columnFormatters = columns.map(col => formatterFor(col, formatters));
    _.times(placement.dataLength, index => {
        const item: unknown = data?.[index];
        const record = _.isUndefined(item) ? null : toRecord(item);

        lines.push(columns.map((col, j) => {
            if (col.compareWith || !record) return '';
            const raw = record.fieldValue(col.fieldName);
            const formatter = columnFormatters[j];
            return toCellValue(formatter ? formatter(raw) : raw);
        }));
    });
    return lines;
}

/**
 * Write a planned sheet as CSV, one blank line between sections.
 * Sections with neither data nor header are skipped. Ends `stream`.
 */
export async function writeCsv(
    stream: Writable,
    plan: SheetPlan,
    formatters: ReadonlyMap<string, Formatter>
): Promise<void> {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet(CSV_SHEET);

    const blocks = plan.sections
        .filter(planned => planned.placement.dataLength > 0 || planned.section.showHeader)
        .map(planned => sectionLines(planned, formatters))
        .filter(lines => !_.isEmpty(lines));

    let rowNumber = 0;
    blocks.forEach((lines, index) => {
        // The CSV writer emits skipped row numbers as empty lines
        if (index > 0) rowNumber++;
        lines.forEach(values => {
            rowNumber++;
            worksheet.getRow(rowNumber).values = values;
        });
    });

    // The CSV writer never observes errors of the stream it pipes into
    await Promise.all([
        workbook.csv.write(stream, { sheetName: CSV_SHEET }),
        finished(stream, { readable: false }),
    ]);
}
