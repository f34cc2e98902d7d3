import * as _ from 'lodash-es';
import { parse } from 'yaml';
import { z } from 'zod';
import { ERROR_MESSAGES, SECTION_DIRECTIONS, SECTION_TYPES } from './constants';
import { ConfigError, errorMessage } from './errors';
import type { ColumnConfig, ReportTemplate, SectionConfig } from './types';

// ============================================
// 1. SCHEMA
// ============================================

const colorSchema = z.string().regex(/^#?[0-9a-fA-F]{6}$/, 'expected a 6-digit hex color');

const styleSchema = z.object({
    font: z.object({
        bold: z.boolean().optional(),
        color: colorSchema.optional(),
    }).optional(),
    fill: z.object({
        color: colorSchema,
    }).optional(),
    alignment: z.object({
        horizontal: z.enum(['left', 'center', 'right']).optional(),
        vertical: z.enum(['top', 'center', 'bottom']).optional(),
    }).optional(),
    locked: z.boolean().optional(),
});

const compareRefSchema = z.object({
    section_id: z.string().min(1),
    field_name: z.string().min(1),
}).transform(ref => ({ sectionId: ref.section_id, fieldName: ref.field_name }));

const sizeSchema = z.number().nonnegative();

const columnSchema = z.object({
    field_name: z.string().min(1),
    header: z.string().optional(),
    width: sizeSchema.optional(),
    height: sizeSchema.optional(),
    locked: z.boolean().optional(),
    formatter: z.string().optional(),
    hidden_field_name: z.string().optional(),
    compare_with: compareRefSchema.optional(),
    compare_against: compareRefSchema.optional(),
}).transform((col): ColumnConfig => ({
    fieldName: col.field_name,
    header: col.header,
    width: col.width,
    height: col.height,
    locked: col.locked,
    formatterName: col.formatter,
    hiddenFieldName: col.hidden_field_name,
    compareWith: col.compare_with,
    compareAgainst: col.compare_against,
}));

const sectionSchema = z.object({
    id: z.string().optional(),
    title: z.string().optional(),
    type: z.enum(SECTION_TYPES).optional(),
    direction: z.enum(SECTION_DIRECTIONS).optional(),
    position: z.string().optional(),
    locked: z.boolean().optional(),
    show_header: z.boolean().optional(),
    col_span: z.number().int().nonnegative().optional(),
    source_sections: z.array(z.string().min(1)).optional(),
    title_style: styleSchema.optional(),
    header_style: styleSchema.optional(),
    data_style: styleSchema.optional(),
    title_height: sizeSchema.optional(),
    header_height: sizeSchema.optional(),
    data_height: sizeSchema.optional(),
    has_filter: z.boolean().optional(),
    columns: z.array(columnSchema).optional(),
}).transform((sec): SectionConfig => ({
    id: sec.id,
    title: sec.title,
    type: sec.type,
    direction: sec.direction,
    position: sec.position,
    locked: sec.locked,
    showHeader: sec.show_header,
    colSpan: sec.col_span,
    sourceSections: sec.source_sections,
    titleStyle: sec.title_style,
    headerStyle: sec.header_style,
    dataStyle: sec.data_style,
    titleHeight: sec.title_height,
    headerHeight: sec.header_height,
    dataHeight: sec.data_height,
    hasFilter: sec.has_filter,
    columns: sec.columns,
}));

const reportTemplateSchema = z.object({
    sheets: z.array(z.object({
        name: z.string().min(1),
        sections: z.array(sectionSchema).default([]),
    })),
});

// ============================================
// 2. PARSING
// ============================================

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

function parseText(source: string): unknown {
    if (_.isEmpty(_.trim(source))) {
        throw new ConfigError(ERROR_MESSAGES.EMPTY_TEMPLATE);
    }
    try {
        return parse(source);
    } catch (err) {
        throw new ConfigError(ERROR_MESSAGES.TEMPLATE_PARSE_FAILED(errorMessage(err)), { cause: err });
    }
}

/**
 * Parse a declarative report document (YAML or JSON text, or an already parsed object)
 */
export function parseReportTemplate(source: string | object): ReportTemplate {
    const document = _.isString(source) ? parseText(source) : source;
    if (_.isNil(document)) {
        throw new ConfigError(ERROR_MESSAGES.EMPTY_TEMPLATE);
    }

    const result = reportTemplateSchema.safeParse(document);
    if (!result.success) {
        throw new ConfigError(ERROR_MESSAGES.TEMPLATE_INVALID(formatIssues(result.error)), { cause: result.error });
    }
    return result.data;
}
