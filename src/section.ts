import * as _ from 'lodash-es';
import type {
    ColumnConfig,
    SectionConfig,
    SectionDirection,
    SectionType,
    StyleTemplate,
} from './types';

/**
 * A configured section. Stays mutable until a render starts, so callers can
 * adjust headers and widths after loading a template.
 */
export class Section implements SectionConfig {
    id?: string;
    title?: string;
    type?: SectionType;
    direction?: SectionDirection;
    position?: string;
    locked?: boolean;
    showHeader?: boolean;
    colSpan?: number;
    sourceSections?: string[];
    titleStyle?: StyleTemplate;
    headerStyle?: StyleTemplate;
    dataStyle?: StyleTemplate;
    titleHeight?: number;
    headerHeight?: number;
    dataHeight?: number;
    hasFilter?: boolean;
    columns: ColumnConfig[];
    data?: readonly unknown[];

    constructor(config: SectionConfig) {
        this.id = config.id || undefined;
        this.title = config.title;
        this.type = config.type;
        this.direction = config.direction;
        this.position = config.position;
        this.locked = config.locked;
        this.showHeader = config.showHeader;
        this.colSpan = config.colSpan;
        this.sourceSections = config.sourceSections;
        this.titleStyle = config.titleStyle;
        this.headerStyle = config.headerStyle;
        this.dataStyle = config.dataStyle;
        this.titleHeight = config.titleHeight;
        this.headerHeight = config.headerHeight;
        this.dataHeight = config.dataHeight;
        this.hasFilter = config.hasFilter;
        this.columns = config.columns ? [...config.columns] : [];
        this.data = config.data;
    }

    get kind(): SectionType {
        return this.type ?? 'full';
    }

    get isLocked(): boolean {
        return this.locked ?? false;
    }

    /** Identifier used in log lines and messages */
    get label(): string {
        return this.id ?? this.title ?? '(untitled)';
    }

    getColumn(fieldName: string): ColumnConfig | undefined {
        return _.find(this.columns, col => col.fieldName === fieldName);
    }
}

/**
 * Owner of section ids, one per workbook
 */
export interface SectionRegistry {
    claimSectionId(id: string): void;
}

export class SheetBuilder<TOwner extends SectionRegistry = SectionRegistry> {
    readonly sections: Section[] = [];

    constructor(private readonly owner: TOwner, readonly name: string) {}

    addSection(config: SectionConfig): this {
        const section = new Section(config);
        if (section.id) {
            this.owner.claimSectionId(section.id);
        }
        this.sections.push(section);
        return this;
    }

    getSection(id: string): Section | undefined {
        return _.find(this.sections, sec => sec.id === id);
    }

    /** Return to the owning exporter */
    build(): TOwner {
        return this.owner;
    }
}
