import { ReportExporter } from './exporter';
import { ReportStreamer } from './streamer';
import { Section, SheetBuilder } from './section';
import { parseReportTemplate } from './template';
import { flattenRecord, flattenRecords } from './converter';
import { MapRecord, ObjectRecord, discoverFields, mergeColumns, toRecord } from './columns';
import { StyleResolver, resolveStyle } from './styles';
import { PlacementTable, columnNumberToLetter, columnLetterToNumber, parsePosition, planSheet } from './layout';
import { createLogger } from './logger';
import {
    BindingError,
    ConfigError,
    ExportError,
    IOError,
    LayoutError,
    ResolutionError,
} from './errors';

// Re-export types for library consumers
export type {
    AlignmentTemplate,
    CellAddress,
    ColumnConfig,
    CompareRef,
    ExporterOptions,
    FillTemplate,
    FontTemplate,
    Formatter,
    ReportTemplate,
    SectionConfig,
    SectionDirection,
    SectionPlacement,
    SectionType,
    SheetTemplate,
    StyleRole,
    StyleTemplate,
} from './types';
export type { RecordAccessor } from './columns';
export type { ExportErrorCode } from './errors';
export type { FlatRow } from './converter';
export type { SheetPlan, PlannedSection } from './layout';
export type { StreamState, StreamStats } from './streamer';

// ============================================
// EXPORTS
// ============================================

export {
    // Entry points
    ReportExporter,
    ReportStreamer,
    parseReportTemplate,

    // Configuration model
    Section,
    SheetBuilder,

    // Data helpers
    flattenRecord,
    flattenRecords,
    MapRecord,
    ObjectRecord,
    toRecord,
    discoverFields,
    mergeColumns,

    // Layout & styles
    planSheet,
    PlacementTable,
    parsePosition,
    columnLetterToNumber,
    columnNumberToLetter,
    resolveStyle,
    StyleResolver,

    // Logging
    createLogger,

    // Errors
    ExportError,
    ConfigError,
    BindingError,
    ResolutionError,
    LayoutError,
    IOError,
};
