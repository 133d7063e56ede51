import { FetchTarget } from '../types';

/** `{baseUrl}{id}.json?{query}` for each id in `from..to`. */
export interface TargetRange {
    baseUrl: string;
    from: number;
    to: number;
    extension?: string;
    query?: Record<string, string>;
}

function isRange(value: unknown): value is TargetRange {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    return typeof Reflect.get(value, 'baseUrl') === 'string'
        && Number.isInteger(Reflect.get(value, 'from'))
        && Number.isInteger(Reflect.get(value, 'to'));
}

export function expandRange({ baseUrl, from, to, extension = '.json', query }: TargetRange): FetchTarget[] {
    const search = query && Object.keys(query).length > 0 ? `?${new URLSearchParams(query).toString()}` : '';
    const targets: FetchTarget[] = [];
    for (let id = from; id <= to; id++) {
        targets.push({ url: `${baseUrl}${id}${extension}${search}`, id });
    }
    return targets;
}

/** Accepts either a list of targets or a range description. */
export function parseTargets(input: unknown): FetchTarget[] {
    if (isRange(input)) return expandRange(input);

    if (!Array.isArray(input)) {
        throw new Error('Targets must be an array or a { baseUrl, from, to } range');
    }

    return input.map((entry: unknown, index): FetchTarget => {
        if (typeof entry === 'string') return entry;
        if (typeof entry === 'object' && entry !== null) {
            const url: unknown = Reflect.get(entry, 'url');
            const id: unknown = Reflect.get(entry, 'id');
            if (typeof url === 'string') {
                return typeof id === 'string' || typeof id === 'number' ? { url, id } : { url };
            }
        }
        throw new Error(`Target at position ${index} has no url`);
    });
}
