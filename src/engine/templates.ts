/**
 * Placeholder Templates
 *
 * `{{name}}` tokens in agent arguments and environment values.
 *
 * @module agent-orchestrator/engine/templates
 */

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z_][\w.-]*)\s*\}\}/g;

/**
 * Placeholders the engine fills for every step
 */
export const BUILTIN_PLACEHOLDERS = [
  'targetLanguage',
  'sourceLanguage',
  'outputDir',
  'stepOutputDir',
  'invocationId',
] as const;

export type BuiltinPlaceholder = (typeof BUILTIN_PLACEHOLDERS)[number];

const builtinSet: ReadonlySet<string> = new Set(BUILTIN_PLACEHOLDERS);

export function isBuiltinPlaceholder(name: string): name is BuiltinPlaceholder {
  return builtinSet.has(name);
}

/**
 * Placeholder names used in a template, in order of first appearance
 *
 * @example
 * ```typescript
 * extractPlaceholders('--in {{audioPath}} --lang {{ targetLanguage }}');
 * // ['audioPath', 'targetLanguage']
 * ```
 */
export function extractPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Placeholders used anywhere in an agent's arguments or environment values
 */
export function collectPlaceholders(
  args: readonly string[],
  env: Readonly<Record<string, string>>,
): string[] {
  const names = new Set<string>();
  for (const value of [...args, ...Object.values(env)]) {
    for (const name of extractPlaceholders(value)) {
      names.add(name);
    }
  }
  return Array.from(names);
}

/**
 * Substitute known placeholders. Unknown ones are left as written.
 *
 * @example
 * ```typescript
 * renderTemplate('{{outputDir}}/notes.md', { outputDir: '/tmp/run' }); // '/tmp/run/notes.md'
 * renderTemplate('{{missing}}', {});                                   // '{{missing}}'
 * ```
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(PLACEHOLDER_PATTERN, (token: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? (values[name] ?? token) : token,
  );
}

/**
 * Render every value of an environment map
 */
export function renderEnvironment(
  env: Readonly<Record<string, string>>,
  values: Readonly<Record<string, string>>,
): Record<string, string> {
  const rendered: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    rendered[key] = renderTemplate(value, values);
  }
  return rendered;
}
