import * as _ from 'lodash-es';
import type ExcelJS from 'exceljs';
import { DEFAULT_LOCKED_COLOR, HIDDEN_FILL_COLOR } from './constants';
import type { ColumnConfig, StyleRole, StyleTemplate } from './types';

// ============================================
// 1. DEFAULTS
// ============================================

const HEADING_STYLE: StyleTemplate = {
    font: { bold: true },
    alignment: { horizontal: 'center', vertical: 'top' },
};

/**
 * Built-in style per role, the bottom of every cascade
 */
export const BUILT_IN_STYLES: Readonly<Record<StyleRole, StyleTemplate | undefined>> = {
    title: HEADING_STYLE,
    header: HEADING_STYLE,
    data: undefined,
};

const HIDDEN_SECTION_DATA_STYLE: StyleTemplate = {
    fill: { color: HIDDEN_FILL_COLOR },
};

// ============================================
// 2. RESOLUTION
// ============================================

/**
 * Merge an explicit style over its fallback and force the lock state.
 * Unset sub-fields inherit from the fallback. Locked cells without a fill get the neutral fill.
 */
export function resolveStyle(
    explicit: StyleTemplate | undefined,
    fallback: StyleTemplate | undefined,
    locked: boolean,
    lockedFillColor: string = DEFAULT_LOCKED_COLOR
): StyleTemplate {
    const base: StyleTemplate = explicit
        ? _.merge({}, fallback, explicit)
        : _.cloneDeep(fallback ?? {});

    const style: StyleTemplate = { ...base, locked };
    if (locked && !style.fill) {
        style.fill = { color: lockedFillColor };
    }
    return style;
}

/**
 * Column lock wins over the section lock
 */
export function isColumnLocked(column: ColumnConfig, sectionLocked: boolean): boolean {
    return column.locked ?? sectionLocked;
}

// ============================================
// 3. EXCELJS CONVERSION
// ============================================

function toArgb(color: string): string {
    return `FF${color.replace(/^#/, '').toUpperCase()}`;
}

/**
 * Convert a resolved template to an exceljs cell style
 */
export function toCellStyle(template: StyleTemplate): Partial<ExcelJS.Style> {
    const style: Partial<ExcelJS.Style> = {};

    if (template.font) {
        const font: Partial<ExcelJS.Font> = {};
        if (!_.isUndefined(template.font.bold)) font.bold = template.font.bold;
        if (template.font.color) font.color = { argb: toArgb(template.font.color) };
        style.font = font;
    }

    if (template.fill) {
        style.fill = {
            type: 'pattern',
            pattern: 'solid',
            fgColor: { argb: toArgb(template.fill.color) },
        };
    }

    if (template.alignment) {
        const alignment: Partial<ExcelJS.Alignment> = {};
        if (template.alignment.horizontal) alignment.horizontal = template.alignment.horizontal;
        if (template.alignment.vertical) {
            alignment.vertical = template.alignment.vertical === 'center' ? 'middle' : template.alignment.vertical;
        }
        style.alignment = alignment;
    }

    if (!_.isUndefined(template.locked)) {
        style.protection = { locked: template.locked };
    }

    return style;
}

// ============================================
// 4. RESOLVER
// ============================================

/**
 * Resolves the style of each rendered cell class and shares identical exceljs
 * style objects between cells
 */
export class StyleResolver {
    private readonly cache = new Map<string, Partial<ExcelJS.Style>>();

    constructor(
        private readonly workbookDefaults: Partial<Record<StyleRole, StyleTemplate>> = {},
        private readonly lockedFillColor: string = DEFAULT_LOCKED_COLOR
    ) {}

    /**
     * Built-in default overlaid with the workbook default for the role
     */
    fallback(role: StyleRole, hiddenSection = false): StyleTemplate | undefined {
        const layers = [
            BUILT_IN_STYLES[role],
            role === 'data' && hiddenSection ? HIDDEN_SECTION_DATA_STYLE : undefined,
            this.workbookDefaults[role],
        ].filter((layer): layer is StyleTemplate => !_.isUndefined(layer));

        if (_.isEmpty(layers)) return undefined;
        return layers.reduce<StyleTemplate>((acc, layer) => _.merge(acc, layer), {});
    }

    resolve(role: StyleRole, explicit: StyleTemplate | undefined, locked: boolean, hiddenSection = false): StyleTemplate {
        return resolveStyle(explicit, this.fallback(role, hiddenSection), locked, this.lockedFillColor);
    }

    cellStyle(role: StyleRole, explicit: StyleTemplate | undefined, locked: boolean, hiddenSection = false): Partial<ExcelJS.Style> {
        return this.toShared(this.resolve(role, explicit, locked, hiddenSection));
    }

    /**
     * Hidden metadata rows ignore every configured style and are always locked
     */
    metadataStyle(): Partial<ExcelJS.Style> {
        return this.toShared({ fill: { color: HIDDEN_FILL_COLOR }, locked: true });
    }

    private toShared(template: StyleTemplate): Partial<ExcelJS.Style> {
        const key = JSON.stringify(template);
        const cached = this.cache.get(key);
        if (cached) return cached;

        const style = toCellStyle(template);
        this.cache.set(key, style);
        return style;
    }
}
