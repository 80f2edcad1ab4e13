/**
 * Prompt template rendering.
 *
 * Templates use `{name}` placeholders. Placeholders without a matching
 * variable are left untouched so that literal braces in a prompt survive.
 */

export type TemplateVariables = Record<string, string>;

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match
  );
}

/**
 * Names of the placeholders a template references, in order of first use.
 */
export function templatePlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Expected placeholders a template does not reference.
 */
export function missingPlaceholders(template: string, expected: readonly string[]): string[] {
  const present = templatePlaceholders(template);
  return expected.filter((name) => !present.includes(name));
}
