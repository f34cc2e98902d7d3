import { describe, it, expect } from 'vitest';
import * as _ from 'lodash-es';
import type ExcelJS from 'exceljs';
import { ERROR_MESSAGES } from './constants';
import { BindingError, ConfigError, IOError, ResolutionError } from './errors';
import { ReportExporter } from './exporter';
import { ReportStreamer } from './streamer';
import { StyleResolver } from './styles';
import { collectingSink, failingSink, loadWorkbook, sheetOf, silentLogger } from './test-utils';

async function finish(streamer: ReportStreamer, done: Promise<Buffer>): Promise<ExcelJS.Workbook> {
    await streamer.close();
    return loadWorkbook(await done);
}

// ============================================
// 1. Static and streamed sections
// ============================================

describe('ReportStreamer - rendering', () => {
    it('should render static sections around streamed batches in declaration order', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ type: 'title', title: 'Summary', colSpan: 2 })
            .addSection({ id: 'rows', showHeader: true })
            .addSection({ id: 'tail', showHeader: true, data: [{ note: 'end' }] });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        expect(streamer.state).toBe('awaiting-first-write');

        await streamer.write('rows', [{ id: 1, name: 'a' }, { id: 2, name: 'b' }]);
        expect(streamer.state).toBe('writing');
        await streamer.write('rows', [{ id: 3, name: 'c' }]);

        const ws = sheetOf(await finish(streamer, done), 'Report');

        expect(ws.getCell('A1').value).toBe('Summary');
        expect(ws.getRow(2).values).toEqual([undefined, 'id', 'name']);
        expect(ws.getRow(3).values).toEqual([undefined, 1, 'a']);
        expect(ws.getRow(5).values).toEqual([undefined, 3, 'c']);
        expect(ws.getCell('A6').value).toBe('note');
        expect(ws.getCell('A7').value).toBe('end');
        expect(ws.rowCount).toBe(7);
        expect(streamer.stats).toEqual({ state: 'closed', rowsWritten: 4, flushes: 0 });
    });

    it('should render intervening sections exactly once before a later write', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ id: 'a' })
            .addSection({ id: 'b' })
            .addSection({ type: 'title', title: 'Static C' })
            .addSection({ id: 'd' });
        exporter.bindSectionData('b', [{ k: 'b1' }]);

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        await streamer.write('d', [{ v: 1 }]);

        const ws = sheetOf(await finish(streamer, done), 'Report');

        expect(ws.getCell('A1').value).toBe('b1');
        expect(ws.getCell('A2').value).toBe('Static C');
        expect(ws.getCell('A3').value).toBe(1);
        expect(ws.rowCount).toBe(3);
    });

    it('should render skipped streaming sections with their header and no data', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ id: 'first', showHeader: true, columns: [{ fieldName: 'x', header: 'X' }] })
            .addSection({ id: 'second', showHeader: true });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        await streamer.write('second', [{ y: 'value' }]);

        const ws = sheetOf(await finish(streamer, done), 'Report');

        expect(ws.getCell('A1').value).toBe('X');
        expect(ws.getCell('A2').value).toBe('y');
        expect(ws.getCell('A3').value).toBe('value');
    });

    it('should continue into later sheets', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('First').addSection({ id: 's1' });
        exporter.addSheet('Second').addSection({ id: 's2', showHeader: true });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        await streamer.write('s1', [{ v: 'one' }]);
        await streamer.write('s2', [{ v: 'two' }]);

        const workbook = await finish(streamer, done);

        expect(sheetOf(workbook, 'First').getCell('A1').value).toBe('one');
        expect(sheetOf(workbook, 'Second').getCell('A1').value).toBe('v');
        expect(sheetOf(workbook, 'Second').getCell('A2').value).toBe('two');
    });

    it('should emit comparison formulas against earlier sections', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ id: 'a', showHeader: true })
            .addSection({ id: 'b', showHeader: true })
            .addSection({
                id: 'cmp',
                showHeader: true,
                sourceSections: ['a'],
                columns: [{
                    fieldName: 'diff',
                    compareWith: { sectionId: 'a', fieldName: 'v' },
                    compareAgainst: { sectionId: 'b', fieldName: 'v' },
                }],
            });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        await streamer.write('a', [{ v: 1 }, { v: 2 }]);
        await streamer.write('b', [{ v: 1 }, { v: 5 }]);

        const ws = sheetOf(await finish(streamer, done), 'Report');

        expect(ws.getCell('A7').value).toBe('diff');
        expect(ws.getCell('A8').formula).toBe('IF(A2<>A5, "Diff", "")');
        expect(ws.getCell('A9').formula).toBe('IF(A3<>A6, "Diff", "")');
    });

    it('should hide the rows of hidden sections', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ id: 'meta', type: 'hidden', showHeader: true })
            .addSection({ id: 'visible' });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        await streamer.write('meta', [{ k: 'x' }]);
        await streamer.write('visible', [{ k: 'y' }]);

        const ws = sheetOf(await finish(streamer, done), 'Report');

        expect(ws.getRow(1).hidden).toBe(true);
        expect(ws.getRow(2).hidden).toBe(true);
        expect(ws.getRow(3).hidden).toBe(false);
        expect(ws.getCell('A3').value).toBe('y');
    });

    it('should protect sheets with locked cells and keep column overrides unlocked', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Locked').addSection({
            id: 'rows',
            locked: true,
            showHeader: true,
            columns: [{ fieldName: 'id', locked: false }, { fieldName: 'name' }],
        });
        exporter.addSheet('Open').addSection({ id: 'free' });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        await streamer.write('rows', [{ id: 1, name: 'Ann' }]);
        await streamer.write('free', [{ v: 1 }]);

        const workbook = await finish(streamer, done);
        const locked = sheetOf(workbook, 'Locked');

        expect(_.get(locked, ['sheetProtection', 'sheet'])).toBe(true);
        expect(locked.getCell('A1').protection?.locked).toBe(false);
        expect(locked.getCell('A2').protection?.locked).toBe(false);
        expect(locked.getCell('B1').protection?.locked).not.toBe(false);
        expect(locked.getCell('B2').protection?.locked).not.toBe(false);
        expect(locked.getCell('B2').value).toBe('Ann');
        expect(_.get(sheetOf(workbook, 'Open'), ['sheetProtection', 'sheet'])).not.toBe(true);
    });

    it('should commit rows every flushEvery rows', async () => {
        const exporter = new ReportExporter({ logger: silentLogger, flushEvery: 2 });
        exporter.addSheet('Report').addSection({ id: 'rows', showHeader: true, columns: [{ fieldName: 'n', width: 12 }] });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);
        await streamer.write('rows', [{ n: 1 }, { n: 2 }, { n: 3 }]);
        await streamer.write('rows', [{ n: 4 }, { n: 5 }]);
        expect(streamer.stats.flushes).toBe(3);

        const ws = sheetOf(await finish(streamer, done), 'Report');

        expect(ws.getColumn(1).width).toBe(12);
        expect([1, 2, 3, 4, 5, 6].map(row => ws.getCell(row, 1).value)).toEqual(['n', 1, 2, 3, 4, 5]);
    });
});

// ============================================
// 2. Ordering and lifecycle
// ============================================

describe('ReportStreamer - ordering', () => {
    function twoSections(): ReportExporter {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ id: 'first' })
            .addSection({ id: 'second' });
        return exporter;
    }

    it('should reject writes to a section already passed', async () => {
        const { sink } = collectingSink();
        const streamer = await twoSections().startStream(sink);
        await streamer.write('second', [{ v: 1 }]);

        await expect(streamer.write('first', [{ v: 2 }])).rejects.toThrow(ERROR_MESSAGES.STREAM_SECTION_PASSED('first'));
    });

    it('should treat title-only sections as static', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ id: 't', type: 'title', title: 'T' })
            .addSection({ id: 'b' });

        const { sink, done } = collectingSink();
        const streamer = await exporter.startStream(sink);

        await expect(streamer.write('t', [{ v: 'extra' }])).rejects.toThrow(ERROR_MESSAGES.STREAM_SECTION_PASSED('t'));
        await streamer.write('b', [{ v: 'row' }]);

        const ws = sheetOf(await finish(streamer, done), 'Report');

        expect(ws.getCell('A1').value).toBe('T');
        expect(ws.getCell('A2').value).toBe('row');
        expect(ws.rowCount).toBe(2);
    });

    it('should reject writes to unknown sections', async () => {
        const { sink } = collectingSink();
        const streamer = await twoSections().startStream(sink);

        await expect(streamer.write('nope', [])).rejects.toBeInstanceOf(BindingError);
    });

    it('should reject writes after close', async () => {
        const { sink, done } = collectingSink();
        const streamer = await twoSections().startStream(sink);
        await finish(streamer, done);

        await expect(streamer.write('first', [])).rejects.toThrow(ERROR_MESSAGES.STREAM_CLOSED);
        await expect(streamer.close()).rejects.toBeInstanceOf(BindingError);
    });

    it('should reject writes before start', async () => {
        const sheet = twoSections().getSheetByIndex(0);
        if (!sheet) throw new Error('sheet missing');

        const { sink } = collectingSink();
        const streamer = new ReportStreamer(
            {
                sheets: [sheet],
                dataFor: section => section.data,
                context: { styles: new StyleResolver(), formatters: new Map(), logger: silentLogger },
                flushEvery: 10,
            },
            sink
        );

        expect(streamer.state).toBe('idle');
        await expect(streamer.write('first', [])).rejects.toThrow(ERROR_MESSAGES.STREAM_NOT_STARTED);
    });

    it('should reject overlapping writes', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report').addSection({ id: 'first' }).addSection({ id: 'later' });

        const { sink } = collectingSink();
        const streamer = await exporter.startStream(sink);
        const pending = streamer.write('later', [{ v: 1 }]);

        await expect(streamer.write('later', [{ v: 2 }])).rejects.toThrow(ERROR_MESSAGES.STREAM_BUSY);
        await pending;
    });

    it('should reject close with IOError when the output stream fails', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report').addSection({ showHeader: true, data: [{ v: 1 }] });

        const streamer = await exporter.startStream(failingSink('disk full'));
        const result = streamer.close();

        await expect(result).rejects.toBeInstanceOf(IOError);
        await expect(result).rejects.toThrow('Failed to write output: disk full');
        expect(streamer.state).toBe('closed');
    });

    it('should surface unresolvable comparison columns', async () => {
        const exporter = new ReportExporter({ logger: silentLogger });
        exporter.addSheet('Report')
            .addSection({ id: 'a', data: [{ v: 1 }] })
            .addSection({
                id: 'cmp',
                sourceSections: ['a'],
                columns: [{
                    fieldName: 'diff',
                    compareWith: { sectionId: 'ghost', fieldName: 'v' },
                    compareAgainst: { sectionId: 'a', fieldName: 'v' },
                }],
            });

        const { sink } = collectingSink();
        await expect(exporter.startStream(sink)).rejects.toBeInstanceOf(ResolutionError);
    });

    it('should refuse to stream a workbook without sheets', async () => {
        const { sink } = collectingSink();
        await expect(new ReportExporter({ logger: silentLogger }).startStream(sink)).rejects.toBeInstanceOf(ConfigError);
    });
});
