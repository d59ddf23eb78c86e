export type TemplateVars = Record<string, string | boolean | undefined>;

export function renderTemplate(template: string, vars: TemplateVars): string {
  let result = template;

  // Process {{#if var}}...{{else}}...{{/if}} blocks
  result = result.replace(
    /\{\{#if (\w+)\}\}([\s\S]*?)\{\{\/if\}\}/g,
    (_match, key: string, body: string) => {
      const value = vars[key];
      const isTruthy = value !== undefined && value !== false && value !== '';

      const elseParts = body.split(/\{\{else\}\}/);
      if (isTruthy) {
        return elseParts[0];
      }
      return elseParts[1] ?? '';
    },
  );

  // Process simple {{var}} replacements
  result = result.replace(/\{\{(\w+)\}\}/g, (match, key: string) => {
    const value = vars[key];
    if (value === undefined) return match;
    return String(value);
  });

  return result;
}

/** Placeholders that survived rendering, e.g. `{{port}}` with no `port` var. */
export function unresolvedPlaceholders(rendered: string): string[] {
  return [...rendered.matchAll(/\{\{([#/]?\w+)\}\}/g)].map((m) => m[1]);
}
