import { ColorSource } from './types.js';

/** Uniform colour source */
export function uniformColor(color: string): ColorSource {
    return { kind: 'uniform', color };
}

/** Per-key colour source with a fallback for keys missing from the table */
export function colorByKey(colors: Readonly<Record<string, string>>, fallback = 'black'): ColorSource {
    return { kind: 'by-key', colors, fallback };
}

/**
 * Resolve a colour source for one section.
 */
export function resolveColor(source: ColorSource, key: string): string {
    switch (source.kind) {
        case 'uniform':
            return source.color;
        case 'by-key':
            return Object.prototype.hasOwnProperty.call(source.colors, key)
                ? source.colors[key]
                : source.fallback;
    }
}
