import * as _ from 'lodash-es';
import ExcelJS from 'exceljs';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { Logger } from 'pino';
import { DEFAULT_FLUSH_EVERY, DEFAULT_LOCKED_COLOR, ERROR_MESSAGES } from './constants';
import { writeCsv } from './csv';
import type { EmitContext } from './emitter';
import { BindingError, ConfigError, ExportError, IOError, errorMessage } from './errors';
import { planSheet, type DataSource } from './layout';
import { logger as defaultLogger } from './logger';
import { renderSheet } from './renderer';
import { Section, SheetBuilder, type SectionRegistry } from './section';
import { ReportStreamer } from './streamer';
import { StyleResolver } from './styles';
import { parseReportTemplate } from './template';
import type { ExporterOptions, Formatter } from './types';

/**
 * Run an output step, wrapping anything that is not already an engine error in IOError
 */
async function guardWrite<T>(step: () => Promise<T>): Promise<T> {
    try {
        return await step();
    } catch (err) {
        if (err instanceof ExportError) throw err;
        throw new IOError(ERROR_MESSAGES.WRITE_FAILED(errorMessage(err)), { cause: err });
    }
}

/**
 * Builds sectioned workbooks from code or from a declarative template, and
 * writes them in one go or as a stream
 */
export class ReportExporter implements SectionRegistry {
    readonly logger: Logger;

    private readonly sheets: SheetBuilder<ReportExporter>[] = [];
    private readonly sectionIds = new Set<string>();
    private readonly boundData = new Map<string, readonly unknown[]>();
    private readonly formatters = new Map<string, Formatter>();
    private readonly flushEvery: number;

    constructor(private readonly options: ExporterOptions = {}) {
        this.flushEvery = options.flushEvery ?? DEFAULT_FLUSH_EVERY;
        if (!Number.isInteger(this.flushEvery) || this.flushEvery < 1) {
            throw new ConfigError(ERROR_MESSAGES.INVALID_FLUSH_EVERY(this.flushEvery));
        }
        this.logger = options.logger ?? defaultLogger.child({ component: 'exporter' });
    }

    /**
     * Exporter pre-populated from YAML/JSON text or a parsed document
     */
    static fromTemplate(source: string | object, options?: ExporterOptions): ReportExporter {
        const template = parseReportTemplate(source);
        const exporter = new ReportExporter(options);

        template.sheets.forEach(sheet => {
            const builder = exporter.addSheet(sheet.name);
            sheet.sections.forEach(section => builder.addSection(section));
        });
        return exporter;
    }

    // ============================================
    // CONFIGURATION
    // ============================================

    addSheet(name: string): SheetBuilder<ReportExporter> {
        if (this.getSheet(name)) {
            throw new ConfigError(ERROR_MESSAGES.DUPLICATE_SHEET(name));
        }
        const sheet = new SheetBuilder(this, name);
        this.sheets.push(sheet);
        return sheet;
    }

    claimSectionId(id: string): void {
        if (this.sectionIds.has(id)) {
            throw new ConfigError(ERROR_MESSAGES.DUPLICATE_SECTION(id));
        }
        this.sectionIds.add(id);
    }

    getSheet(name: string): SheetBuilder<ReportExporter> | undefined {
        return _.find(this.sheets, sheet => sheet.name === name);
    }

    getSheetByIndex(index: number): SheetBuilder<ReportExporter> | undefined {
        return this.sheets[index];
    }

    get sheetNames(): string[] {
        return this.sheets.map(sheet => sheet.name);
    }

    getSection(id: string): Section | undefined {
        for (const sheet of this.sheets) {
            const section = sheet.getSection(id);
            if (section) return section;
        }
        return undefined;
    }

    /**
     * Attach data to a section by id. Bound data takes precedence over data set in the configuration.
     */
    bindSectionData(id: string, data: readonly unknown[]): this {
        if (!this.sectionIds.has(id)) {
            throw new BindingError(ERROR_MESSAGES.UNKNOWN_SECTION(id));
        }
        if (!_.isArray(data)) {
            throw new BindingError(ERROR_MESSAGES.UNBOUND_DATA(id));
        }
        this.boundData.set(id, data);
        return this;
    }

    registerFormatter(name: string, formatter: Formatter): this {
        this.formatters.set(name, formatter);
        return this;
    }

    // ============================================
    // BATCH OUTPUT
    // ============================================

    /**
     * Lay out and render every sheet into an in-memory workbook
     */
    async buildDocument(): Promise<ExcelJS.Workbook> {
        this.assertHasSheets();
        const workbook = new ExcelJS.Workbook();
        const context = this.emitContext();

        for (const sheet of this.sheets) {
            const worksheet = workbook.addWorksheet(sheet.name);
            const plan = planSheet(sheet.sections, this.dataFor, this.logger);
            await renderSheet(worksheet, plan, context);
        }

        this.logger.info({ sheets: this.sheets.length }, 'workbook built');
        return workbook;
    }

    async toBytes(): Promise<Buffer> {
        const workbook = await this.buildDocument();
        return guardWrite(async () => Buffer.from(await workbook.xlsx.writeBuffer()));
    }

    /**
     * Write the workbook to `stream` and wait until the stream has finished. Ends `stream`.
     */
    async toWriter(stream: Writable): Promise<void> {
        const workbook = await this.buildDocument();
        // The writer resolves once the archive is produced; sink errors arrive on the stream
        await guardWrite(() => Promise.all([
            workbook.xlsx.write(stream),
            finished(stream, { readable: false }),
        ]));
    }

    async exportToFile(path: string): Promise<void> {
        const workbook = await this.buildDocument();
        await guardWrite(() => workbook.xlsx.writeFile(path));
        this.logger.info({ path }, 'workbook written');
    }

    /**
     * First sheet as CSV. Ends `stream` when done.
     */
    async toCSV(stream: Writable): Promise<void> {
        this.assertHasSheets();
        const plan = planSheet(this.sheets[0].sections, this.dataFor, this.logger);
        await guardWrite(() => writeCsv(stream, plan, this.formatters));
    }

    // ============================================
    // STREAMING OUTPUT
    // ============================================

    /**
     * Open a streaming session on `stream` and render the leading static sections
     */
    async startStream(stream: Writable): Promise<ReportStreamer> {
        this.assertHasSheets();
        const streamer = new ReportStreamer(
            {
                sheets: this.sheets,
                dataFor: this.dataFor,
                context: this.emitContext(),
                flushEvery: this.flushEvery,
            },
            stream
        );
        await streamer.start();
        return streamer;
    }

    // ============================================
    // INTERNALS
    // ============================================

    private readonly dataFor: DataSource = section =>
        (section.id ? this.boundData.get(section.id) : undefined) ?? section.data;

    private emitContext(): EmitContext {
        return {
            styles: new StyleResolver(this.options.defaultStyles, this.options.lockedFillColor ?? DEFAULT_LOCKED_COLOR),
            formatters: this.formatters,
            logger: this.logger,
        };
    }

    private assertHasSheets(): void {
        if (_.isEmpty(this.sheets)) {
            throw new ConfigError(ERROR_MESSAGES.NO_SHEETS);
        }
    }
}
