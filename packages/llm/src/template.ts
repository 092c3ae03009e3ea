const PLACEHOLDER = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

export type TemplateValue = string | number | boolean | null | undefined;

/**
 * Substitute {{ name }} placeholders.
 * Unknown names render as an empty string. Values are inserted verbatim.
 */
export function renderTemplate(template: string, variables: Record<string, TemplateValue>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = variables[name];
    return value === undefined || value === null ? '' : String(value);
  });
}

/**
 * Placeholder names used by a template, in order of first appearance
 */
export function templateVariables(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    const name = match[1];
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}
