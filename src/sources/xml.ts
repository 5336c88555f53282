import { XMLParser } from 'fast-xml-parser';

/**
 * Helpers for walking fast-xml-parser output without trusting its shape.
 */

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    // DOIs and identifiers must stay strings
    parseTagValue: false,
});

export type XmlNode = Record<string, unknown>;

export function parseXml(xml: string): unknown {
    const parsed: unknown = xmlParser.parse(xml);
    return parsed;
}

export function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follow a path of element names; undefined as soon as one is missing.
 */
export function child(node: unknown, ...path: string[]): unknown {
    let current = node;
    for (const key of path) {
        if (!isNode(current)) return undefined;
        current = current[key];
    }
    return current;
}

/**
 * Single elements parse as objects, repeated ones as arrays. Always get an array.
 */
export function asArray(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Concatenate the text content of a node, skipping attributes.
 * Mixed content such as `<i>in vivo</i>` inside a title is kept as text.
 */
export function flattenText(value: unknown): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (Array.isArray(value)) {
        return value.map(flattenText).join(' ').trim();
    }
    if (isNode(value)) {
        const parts: string[] = [];
        if (value['#text'] !== undefined) parts.push(flattenText(value['#text']));
        for (const [key, childValue] of Object.entries(value)) {
            if (key === '#text' || key.startsWith('@_')) continue;
            const text = flattenText(childValue);
            if (text) parts.push(text);
        }
        return parts.join(' ').trim();
    }
    return '';
}

export function attribute(node: unknown, name: string): string | undefined {
    const value = child(node, `@_${name}`);
    return typeof value === 'string' ? value : undefined;
}
