/**
 * Substitutes `{{name}}` placeholders. Values are inserted verbatim, so `$`
 * sequences in user text are not interpreted. Unknown placeholders are left as is.
 */
export function fillPrompt(template: string, values: Record<string, string>): string {
    return template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) =>
        Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
    );
}
