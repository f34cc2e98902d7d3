import * as _ from 'lodash-es';
import ExcelJS from 'exceljs';
import { PassThrough, Writable } from 'node:stream';
import { createLogger } from './logger';
import type { SectionRegistry } from './section';

/** Logger that drops everything */
export const silentLogger = createLogger('silent');

/** Registry that accepts every id, for building sections outside an exporter */
export const openRegistry: SectionRegistry = {
    claimSectionId: () => undefined,
};

export function sheetOf(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
    const worksheet = workbook.getWorksheet(name);
    if (!worksheet) {
        throw new Error(`Worksheet '${name}' not found`);
    }
    return worksheet;
}

/**
 * Sink that buffers everything written to it until the writer ends it
 */
export function collectingSink(): { sink: PassThrough; done: Promise<Buffer> } {
    const sink = new PassThrough();
    const chunks: Buffer[] = [];
    const done = new Promise<Buffer>((resolve, reject) => {
        sink.on('data', (chunk: Buffer) => chunks.push(chunk));
        sink.on('end', () => resolve(Buffer.concat(chunks)));
        sink.on('error', reject);
    });
    return { sink, done };
}

/**
 * Sink whose every write fails, after `delayMs` when given
 */
export function failingSink(message: string, delayMs?: number): Writable {
    return new Writable({
        write(_chunk, _encoding, callback) {
            const error = new Error(message);
            if (_.isUndefined(delayMs)) {
                callback(error);
            } else {
                setTimeout(() => callback(error), delayMs);
            }
        },
    });
}

export async function loadWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(buffer);
    return workbook;
}
