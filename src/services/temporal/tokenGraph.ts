/**
 * Flat parser output (heads by index) to a linked token graph.
 */

import { z } from 'zod';
import type { DependencyToken } from './temporal.types';

export const flatTokenSchema = z.object({
  text: z.string(),
  lemma: z.string(),
  shape: z.string().optional(),
  dep: z.string(),
  /** Index of the head token; a root points at itself */
  head: z.number().int().min(0),
});

export const flatTokenListSchema = z.array(flatTokenSchema).superRefine((tokens, ctx) => {
  tokens.forEach((token, i) => {
    if (token.head >= tokens.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [i, 'head'],
        message: `Head ${token.head} is outside the ${tokens.length} parsed tokens`,
      });
    }
  });
});

export type FlatToken = z.infer<typeof flatTokenSchema>;

/**
 * Word shape: X/x for upper/lower letters, d for digits, other characters
 * kept, runs of the same class capped at four ("2016" -> "dddd",
 * "2016.12" -> "dddd.dd").
 */
export function shapeOf(text: string): string {
  let shape = '';
  let last = '';
  let run = 0;

  for (const char of text) {
    let code: string;
    if (/\p{Lu}/u.test(char)) code = 'X';
    else if (/\p{L}/u.test(char)) code = 'x';
    else if (/\d/.test(char)) code = 'd';
    else code = char;

    run = code === last ? run + 1 : 1;
    last = code;
    if (run <= 4) shape += code;
  }

  return shape;
}

class TokenNode implements DependencyToken {
  head: TokenNode = this;
  readonly children: TokenNode[] = [];

  constructor(
    readonly text: string,
    readonly lemma: string,
    readonly shapeCode: string,
    readonly dependencyRelation: string
  ) {}
}

export function linkTokens(flat: readonly FlatToken[]): DependencyToken[] {
  const nodes = flat.map(
    (token) => new TokenNode(token.text, token.lemma, token.shape ?? shapeOf(token.text), token.dep)
  );

  flat.forEach((token, i) => {
    const node = nodes[i];
    const head = nodes[token.head];
    if (!head) {
      throw new RangeError(`Token ${i} points at missing head ${token.head}`);
    }
    node.head = head;
    if (head !== node) {
      head.children.push(node);
    }
  });

  return nodes;
}
