import { AttributeEntry, AttributeSchema } from '../types';

export const DEFAULT_SCHEMA: AttributeSchema = {
    attributesField: 'attributes',
    traitFields: ['trait_type', 'trait'],
    valueField: 'value'
};

export type ExtractResult =
    | { ok: true; attributes: AttributeEntry[] }
    | { ok: false; detail: string };

export function resolveSchema(overrides?: Partial<AttributeSchema>): AttributeSchema {
    return {
        attributesField: overrides?.attributesField || DEFAULT_SCHEMA.attributesField,
        traitFields: overrides?.traitFields?.length ? overrides.traitFields : DEFAULT_SCHEMA.traitFields,
        valueField: overrides?.valueField || DEFAULT_SCHEMA.valueField
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeValue(value: unknown): string {
    if (value === null || value === undefined || value === '') return 'None';
    return typeof value === 'object' ? JSON.stringify(value) : String(value);
}

/**
 * Pulls the attribute list out of a parsed metadata document.
 * Missing values become "None"; a missing or blank trait name is a shape error.
 */
export function extractAttributes(document: unknown, schema: AttributeSchema): ExtractResult {
    if (!isRecord(document)) {
        return { ok: false, detail: 'metadata is not a JSON object' };
    }

    const rawList = document[schema.attributesField];
    if (rawList === undefined) {
        return { ok: false, detail: `${schema.attributesField} not found` };
    }
    if (!Array.isArray(rawList)) {
        return { ok: false, detail: `${schema.attributesField} is not an array` };
    }

    const attributes: AttributeEntry[] = [];
    for (const [position, raw] of rawList.entries()) {
        if (!isRecord(raw)) {
            return { ok: false, detail: `${schema.attributesField}[${position}] is not an object` };
        }

        const trait = schema.traitFields
            .map(field => raw[field] === undefined || raw[field] === null ? '' : String(raw[field]).trim())
            .find(Boolean) ?? '';
        if (!trait) {
            return { ok: false, detail: `${schema.attributesField}[${position}] has no trait name` };
        }

        attributes.push(Object.freeze({ trait, value: normalizeValue(raw[schema.valueField]) }));
    }

    return { ok: true, attributes };
}
