const HOLE_PATTERN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface RenderedTemplate {
    text: string;
    // Values substituted into the template, in order of appearance
    parameters: unknown[];
}

/**
 * Fills `{name}` holes from `context`.
 *
 * @example
 * renderMessageTemplate('User {user} signed in', {user: 'ada'})
 * // => {text: 'User ada signed in', parameters: ['ada']}
 */
export function renderMessageTemplate(template: string, context?: Record<string, unknown>): RenderedTemplate {
    const parameters: unknown[] = [];

    const text = template.replace(HOLE_PATTERN, (match: string, name: string | undefined) => {
        if (match === '{{') return '{';
        if (match === '}}') return '}';
        if (name === undefined || !context || !Object.prototype.hasOwnProperty.call(context, name)) {
            return match;
        }

        const value = context[name];
        parameters.push(value);
        return formatTemplateValue(value);
    });

    return {text, parameters};
}

export function formatTemplateValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'bigint') return value.toString();

    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        // circular
        return String(value);
    }
}
