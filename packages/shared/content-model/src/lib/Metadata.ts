import _ from 'lodash';

export const DEFAULT_PROCESSING_STATE = 'pending';

export type ExtraData = Record<string, unknown>;

/**
 * Fields describing one piece of content as it moves through the pipeline.
 */
export interface MetadataFields {
    /** Identity of the content, e.g. file:///docs/a.txt */
    readonly sourceUrl: string;
    readonly location?: string;
    readonly title?: string;
    readonly parentId?: string;
    readonly description?: string;
    /** Free-form resumability marker (pending, extracted, ...) */
    readonly processingState: string;
    readonly indexedAt?: Date;
    readonly createdAt?: Date;
    readonly modifiedAt?: Date;
    readonly author?: string;
    readonly tags: readonly string[];
    readonly mimeType?: string;
    readonly extra: Readonly<ExtraData>;
}

export type MetadataInit = { sourceUrl: string } & Partial<Omit<MetadataFields, 'sourceUrl'>>;

/**
 * Partial field set. `null` and `undefined` both mean "no value for this field".
 */
export type MetadataPatch = { [K in keyof MetadataFields]?: MetadataFields[K] | null };

/**
 * JSON form used in queue payloads and key/value storage. Dates are ISO strings.
 */
export interface MetadataRecord {
    sourceUrl: string;
    location?: string;
    title?: string;
    parentId?: string;
    description?: string;
    processingState: string;
    indexedAt?: string;
    createdAt?: string;
    modifiedAt?: string;
    author?: string;
    tags: string[];
    mimeType?: string;
    extra: ExtraData;
}

function pick<T>(base: T, patch: T | null | undefined): T {
    return patch === null || patch === undefined ? base : patch;
}

function override<T>(current: T, change: T | null | undefined, reset: T): T {
    if (change === undefined) {
        return current;
    }
    return change === null ? reset : change;
}

function isMapping(value: unknown): value is ExtraData {
    return _.isPlainObject(value);
}

/**
 * Recursive key-by-key merge, patch wins on leaf conflicts.
 * Only nested mappings recurse; any other value is replaced.
 */
export function mergeMappings(base: Readonly<ExtraData>, patch: Readonly<ExtraData>): ExtraData {
    const merged: ExtraData = _.cloneDeep({ ...base });
    for (const [key, patchValue] of Object.entries(patch)) {
        const baseValue = merged[key];
        if (isMapping(baseValue) && isMapping(patchValue)) {
            merged[key] = mergeMappings(baseValue, patchValue);
        } else {
            merged[key] = _.cloneDeep(patchValue);
        }
    }
    return merged;
}

/**
 * Immutable content description.
 *
 * Every transformation (`copy`, `merge`) returns a new instance; the receiver
 * is frozen and never changes.
 */
export class Metadata implements MetadataFields {
    readonly sourceUrl: string;
    readonly location?: string;
    readonly title?: string;
    readonly parentId?: string;
    readonly description?: string;
    readonly processingState: string;
    readonly indexedAt?: Date;
    readonly createdAt?: Date;
    readonly modifiedAt?: Date;
    readonly author?: string;
    readonly tags: readonly string[];
    readonly mimeType?: string;
    readonly extra: Readonly<ExtraData>;

    constructor(init: MetadataInit) {
        this.sourceUrl = init.sourceUrl;
        this.location = init.location;
        this.title = init.title;
        this.parentId = init.parentId;
        this.description = init.description;
        this.processingState = init.processingState ?? DEFAULT_PROCESSING_STATE;
        this.indexedAt = init.indexedAt ? new Date(init.indexedAt.getTime()) : undefined;
        this.createdAt = init.createdAt ? new Date(init.createdAt.getTime()) : undefined;
        this.modifiedAt = init.modifiedAt ? new Date(init.modifiedAt.getTime()) : undefined;
        this.author = init.author;
        this.tags = Object.freeze([...(init.tags ?? [])]);
        this.mimeType = init.mimeType;
        this.extra = Object.freeze(_.cloneDeep({ ...(init.extra ?? {}) }));
        Object.freeze(this);
    }

    /**
     * Copy with named-field overrides. A `null` override resets the field
     * to its default (absent, `pending`, `[]` or `{}`).
     */
    copy(changes: MetadataPatch = {}): Metadata {
        return new Metadata({
            sourceUrl: changes.sourceUrl ?? this.sourceUrl,
            location: override(this.location, changes.location, undefined),
            title: override(this.title, changes.title, undefined),
            parentId: override(this.parentId, changes.parentId, undefined),
            description: override(this.description, changes.description, undefined),
            processingState: override(this.processingState, changes.processingState, DEFAULT_PROCESSING_STATE),
            indexedAt: override(this.indexedAt, changes.indexedAt, undefined),
            createdAt: override(this.createdAt, changes.createdAt, undefined),
            modifiedAt: override(this.modifiedAt, changes.modifiedAt, undefined),
            author: override(this.author, changes.author, undefined),
            tags: override(this.tags, changes.tags, []),
            mimeType: override(this.mimeType, changes.mimeType, undefined),
            extra: override(this.extra, changes.extra, {}),
        });
    }

    /**
     * Merge a patch into a new instance:
     * - an absent patch value keeps the base value
     * - `tags` concatenate, base first
     * - `extra` merges recursively, patch wins on leaves
     * - any other field is replaced by the patch
     */
    merge(patch: Metadata | MetadataPatch): Metadata {
        const p: MetadataPatch = patch instanceof Metadata ? patch.toFields() : patch;
        return new Metadata({
            sourceUrl: pick(this.sourceUrl, p.sourceUrl),
            location: pick(this.location, p.location),
            title: pick(this.title, p.title),
            parentId: pick(this.parentId, p.parentId),
            description: pick(this.description, p.description),
            processingState: pick(this.processingState, p.processingState),
            indexedAt: pick(this.indexedAt, p.indexedAt),
            createdAt: pick(this.createdAt, p.createdAt),
            modifiedAt: pick(this.modifiedAt, p.modifiedAt),
            author: pick(this.author, p.author),
            tags: p.tags ? [...this.tags, ...p.tags] : this.tags,
            mimeType: pick(this.mimeType, p.mimeType),
            extra: p.extra ? mergeMappings(this.extra, p.extra) : this.extra,
        });
    }

    equals(other: Metadata): boolean {
        return _.isEqual(this.toFields(), other.toFields());
    }

    toFields(): MetadataFields {
        return {
            sourceUrl: this.sourceUrl,
            location: this.location,
            title: this.title,
            parentId: this.parentId,
            description: this.description,
            processingState: this.processingState,
            indexedAt: this.indexedAt,
            createdAt: this.createdAt,
            modifiedAt: this.modifiedAt,
            author: this.author,
            tags: this.tags,
            mimeType: this.mimeType,
            extra: this.extra,
        };
    }

    toJSON(): MetadataRecord {
        const record: MetadataRecord = {
            sourceUrl: this.sourceUrl,
            processingState: this.processingState,
            tags: [...this.tags],
            extra: _.cloneDeep({ ...this.extra }),
        };
        if (this.location !== undefined) record.location = this.location;
        if (this.title !== undefined) record.title = this.title;
        if (this.parentId !== undefined) record.parentId = this.parentId;
        if (this.description !== undefined) record.description = this.description;
        if (this.indexedAt) record.indexedAt = this.indexedAt.toISOString();
        if (this.createdAt) record.createdAt = this.createdAt.toISOString();
        if (this.modifiedAt) record.modifiedAt = this.modifiedAt.toISOString();
        if (this.author !== undefined) record.author = this.author;
        if (this.mimeType !== undefined) record.mimeType = this.mimeType;
        return record;
    }

    /**
     * Rebuild an instance from its JSON form. Throws TypeError on malformed input.
     */
    static fromJSON(value: unknown): Metadata {
        if (!isMapping(value)) {
            throw new TypeError('Metadata record must be an object');
        }
        const sourceUrl = value.sourceUrl;
        if (typeof sourceUrl !== 'string' || sourceUrl === '') {
            throw new TypeError('Metadata record requires a sourceUrl');
        }
        const tags = value.tags ?? [];
        if (!Array.isArray(tags) || !tags.every((t): t is string => typeof t === 'string')) {
            throw new TypeError(`Metadata tags must be a list of strings (${sourceUrl})`);
        }
        const extra = value.extra ?? {};
        if (!isMapping(extra)) {
            throw new TypeError(`Metadata extra must be an object (${sourceUrl})`);
        }
        return new Metadata({
            sourceUrl,
            location: optionalString(value, 'location'),
            title: optionalString(value, 'title'),
            parentId: optionalString(value, 'parentId'),
            description: optionalString(value, 'description'),
            processingState: optionalString(value, 'processingState'),
            indexedAt: optionalDate(value, 'indexedAt'),
            createdAt: optionalDate(value, 'createdAt'),
            modifiedAt: optionalDate(value, 'modifiedAt'),
            author: optionalString(value, 'author'),
            tags,
            mimeType: optionalString(value, 'mimeType'),
            extra,
        });
    }
}

function optionalString(record: ExtraData, key: string): string | undefined {
    const value = record[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new TypeError(`Metadata field '${key}' must be a string`);
    }
    return value;
}

function optionalDate(record: ExtraData, key: string): Date | undefined {
    const value = optionalString(record, key);
    if (value === undefined) {
        return undefined;
    }
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
        throw new TypeError(`Metadata field '${key}' is not a valid date: ${value}`);
    }
    return date;
}
