/**
 * Deck Report Module - Template Engine
 *
 * Literal `{name}` substitution. The template is scanned once and every
 * placeholder is resolved against the token map in that single pass, so
 * substituted values are never rescanned: a value containing `{other}` is
 * emitted verbatim and the result does not depend on map order.
 */

import type { TokenMap } from './types.js';

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replaces every known placeholder. Unknown placeholders stay literal.
 */
export function renderTemplate(template: string, tokens: TokenMap): string {
  return template.replace(
    PLACEHOLDER_PATTERN,
    (placeholder: string, name: string) => tokens.get(name) ?? placeholder
  );
}

/**
 * Names of placeholders with no token, in order of first appearance.
 */
export function findUnresolvedPlaceholders(template: string, tokens: TokenMap): string[] {
  const names = new Set<string>();

  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !tokens.has(name)) {
      names.add(name);
    }
  }

  return [...names];
}
