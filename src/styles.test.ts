import { describe, it, expect } from 'vitest';
import { BUILT_IN_STYLES, StyleResolver, isColumnLocked, resolveStyle, toCellStyle } from './styles';
import type { StyleTemplate } from './types';

// ============================================
// 1. resolveStyle
// ============================================

describe('resolveStyle', () => {
    const fallback: StyleTemplate = {
        font: { bold: true },
        alignment: { horizontal: 'center', vertical: 'top' },
    };

    it('should use the fallback verbatim when no explicit style is given', () => {
        expect(resolveStyle(undefined, fallback, false)).toEqual({ ...fallback, locked: false });
    });

    it('should back-fill unset fields from the fallback', () => {
        const explicit: StyleTemplate = { font: { color: 'FF0000' }, fill: { color: '00FF00' } };
        expect(resolveStyle(explicit, fallback, false)).toEqual({
            font: { bold: true, color: 'FF0000' },
            fill: { color: '00FF00' },
            alignment: { horizontal: 'center', vertical: 'top' },
            locked: false,
        });
    });

    it('should force the lock flag regardless of the inputs', () => {
        expect(resolveStyle({ locked: false }, { locked: false }, true).locked).toBe(true);
        expect(resolveStyle({ locked: true }, undefined, false).locked).toBe(false);
    });

    it('should give locked cells without a fill the neutral fill', () => {
        expect(resolveStyle(undefined, undefined, true)).toEqual({
            locked: true,
            fill: { color: 'E0E0E0' },
        });
        expect(resolveStyle(undefined, undefined, true, 'CCCCCC').fill).toEqual({ color: 'CCCCCC' });
    });

    it('should keep an explicit fill on locked cells', () => {
        expect(resolveStyle({ fill: { color: '123456' } }, undefined, true).fill).toEqual({ color: '123456' });
    });

    it('should not mutate its inputs', () => {
        const explicit: StyleTemplate = { font: { color: 'FF0000' } };
        resolveStyle(explicit, fallback, true);

        expect(explicit).toEqual({ font: { color: 'FF0000' } });
        expect(fallback).toEqual({ font: { bold: true }, alignment: { horizontal: 'center', vertical: 'top' } });
    });
});

// ============================================
// 2. isColumnLocked
// ============================================

describe('isColumnLocked', () => {
    it('should let the column override win over the section', () => {
        expect(isColumnLocked({ fieldName: 'a', locked: false }, true)).toBe(false);
        expect(isColumnLocked({ fieldName: 'a', locked: true }, false)).toBe(true);
    });

    it('should fall back to the section lock', () => {
        expect(isColumnLocked({ fieldName: 'a' }, true)).toBe(true);
        expect(isColumnLocked({ fieldName: 'a' }, false)).toBe(false);
    });
});

// ============================================
// 3. toCellStyle
// ============================================

describe('toCellStyle', () => {
    it('should convert every part of a template', () => {
        const style = toCellStyle({
            font: { bold: true, color: '#ff0000' },
            fill: { color: '00FF00' },
            alignment: { horizontal: 'right', vertical: 'center' },
            locked: true,
        });

        expect(style).toEqual({
            font: { bold: true, color: { argb: 'FFFF0000' } },
            fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF00FF00' } },
            alignment: { horizontal: 'right', vertical: 'middle' },
            protection: { locked: true },
        });
    });

    it('should produce an empty style for an empty template', () => {
        expect(toCellStyle({})).toEqual({});
    });
});

// ============================================
// 4. StyleResolver
// ============================================

describe('StyleResolver', () => {
    it('should layer workbook defaults over the built-in style', () => {
        const resolver = new StyleResolver({ header: { fill: { color: 'CCCCCC' } } });
        expect(resolver.resolve('header', undefined, false)).toEqual({
            font: { bold: true },
            alignment: { horizontal: 'center', vertical: 'top' },
            fill: { color: 'CCCCCC' },
            locked: false,
        });
    });

    it('should let the section style win over the workbook default', () => {
        const resolver = new StyleResolver({ data: { font: { color: '111111' } } });
        expect(resolver.resolve('data', { font: { color: '222222' } }, false)).toEqual({
            font: { color: '222222' },
            locked: false,
        });
    });

    it('should fill data cells of hidden sections', () => {
        const resolver = new StyleResolver();
        expect(resolver.resolve('data', undefined, true, true)).toEqual({
            fill: { color: 'FFFF00' },
            locked: true,
        });
    });

    it('should share identical cell styles', () => {
        const resolver = new StyleResolver();
        const first = resolver.cellStyle('title', undefined, false);
        const second = resolver.cellStyle('title', undefined, false);

        expect(second).toBe(first);
        expect(resolver.cellStyle('title', undefined, true)).not.toBe(first);
    });

    it('should always lock metadata rows', () => {
        expect(new StyleResolver().metadataStyle()).toEqual({
            fill: { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFFF00' } },
            protection: { locked: true },
        });
    });

    it('should leave the built-in styles untouched', () => {
        new StyleResolver({ title: { font: { bold: false } } }).resolve('title', undefined, false);
        expect(BUILT_IN_STYLES.title).toEqual({
            font: { bold: true },
            alignment: { horizontal: 'center', vertical: 'top' },
        });
    });
});
