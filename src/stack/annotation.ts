/**
 * Branch annotations: free text plus qualifier tokens
 */

import type { Annotation, BranchQualifiers } from './types.js';

export const DEFAULT_QUALIFIERS: Readonly<BranchQualifiers> = {
  rebase: true,
  push: true,
  slideOut: true,
  updateWithMerge: false,
};

/**
 * Qualifier tokens in the order they are written back
 */
const QUALIFIER_TOKENS: ReadonlyArray<{
  token: string;
  key: keyof BranchQualifiers;
  value: boolean;
}> = [
  { token: 'rebase=no', key: 'rebase', value: false },
  { token: 'push=no', key: 'push', value: false },
  { token: 'slide-out=no', key: 'slideOut', value: false },
  { token: 'update=merge', key: 'updateWithMerge', value: true },
];

export const EMPTY_ANNOTATION: Readonly<Annotation> = { text: '', qualifiers: DEFAULT_QUALIFIERS };

function tokenPattern(token: string): RegExp {
  const escaped = token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?:^|\\s+)${escaped}(?=\\s|$)`, 'g');
}

/**
 * Split raw annotation text into visible text and qualifiers.
 * Only whole whitespace-delimited tokens count as qualifiers.
 */
export function parseAnnotation(raw: string): Annotation {
  const qualifiers: BranchQualifiers = { ...DEFAULT_QUALIFIERS };
  let text = raw;

  for (const { token, key, value } of QUALIFIER_TOKENS) {
    const pattern = tokenPattern(token);
    if (pattern.test(text)) {
      qualifiers[key] = value;
      text = text.replace(pattern, '');
    }
  }

  return { text: text.trim(), qualifiers };
}

export function qualifiersText(qualifiers: BranchQualifiers): string {
  return QUALIFIER_TOKENS.filter(({ key, value }) => qualifiers[key] === value)
    .map(({ token }) => token)
    .join(' ');
}

/**
 * Annotation as written after the branch name (without the separating space)
 */
export function formatAnnotation(annotation: Annotation): string {
  return [annotation.text, qualifiersText(annotation.qualifiers)].filter(Boolean).join(' ');
}

export function isEmptyAnnotation(annotation: Annotation): boolean {
  return formatAnnotation(annotation) === '';
}

/**
 * Replace the visible text, keeping qualifiers unless the new text carries its own
 */
export function withText(annotation: Annotation, raw: string): Annotation {
  const parsed = parseAnnotation(raw);
  const hasQualifiers = qualifiersText(parsed.qualifiers) !== '';
  return {
    text: parsed.text,
    qualifiers: hasQualifiers ? parsed.qualifiers : { ...annotation.qualifiers },
  };
}
