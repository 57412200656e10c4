/**
 * Typographic replacements: `(c)` -> ©, `-->` -> →, `1/2` -> ½, `2nd` ...
 *
 * @module extensions/smart-symbols
 */
import { z } from 'zod';

import { defineExtension } from '../core/extension.js';
import { element, text } from '../core/nodes.js';
import { patternRule } from '../core/rules.js';

const options = z
  .object({
    trademark: z.boolean().default(true),
    copyright: z.boolean().default(true),
    registered: z.boolean().default(true),
    careOf: z.boolean().default(true),
    plusMinus: z.boolean().default(true),
    notEqual: z.boolean().default(true),
    arrows: z.boolean().default(true),
    fractions: z.boolean().default(true),
    ordinalNumbers: z.boolean().default(true),
  })
  .strict();

interface SymbolRule {
  name: string;
  option: keyof z.output<typeof options>;
  pattern: RegExp;
  replacement: string;
}

// Longer arrows come first so `<-->` wins over `<--` at the same offset.
const SYMBOLS: SymbolRule[] = [
  { name: 'trademark', option: 'trademark', pattern: /\(tm\)/i, replacement: '™' },
  { name: 'copyright', option: 'copyright', pattern: /\(c\)/i, replacement: '©' },
  { name: 'registered', option: 'registered', pattern: /\(r\)/i, replacement: '®' },
  { name: 'care-of', option: 'careOf', pattern: /\bc\/o\b/, replacement: '℅' },
  { name: 'plus-minus', option: 'plusMinus', pattern: /\+\/-/, replacement: '±' },
  { name: 'not-equal', option: 'notEqual', pattern: /=\/=/, replacement: '≠' },
  { name: 'double-arrow', option: 'arrows', pattern: /<-->/, replacement: '↔' },
  { name: 'left-arrow', option: 'arrows', pattern: /<--(?!>)/, replacement: '←' },
  { name: 'right-arrow', option: 'arrows', pattern: /-->/, replacement: '→' },
];

const FRACTIONS: Record<string, string> = {
  '1/4': '¼',
  '1/2': '½',
  '3/4': '¾',
  '1/3': '⅓',
  '2/3': '⅔',
  '1/5': '⅕',
  '1/6': '⅙',
  '1/8': '⅛',
  '3/8': '⅜',
  '5/8': '⅝',
  '7/8': '⅞',
};

const FRACTION_RE = /(?<![\w/])(\d\/\d)(?![\w/])/;
const ORDINAL_RE = /\b(\d+)(st|nd|rd|th)\b/;

/** Suffix an ordinal number takes in English. */
export function ordinalSuffix(value: number): string {
  const lastTwo = value % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return 'th';
  switch (value % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
}

export const smartSymbols = defineExtension({
  name: 'smartSymbols',
  options,
  setup({ inline }, enabled) {
    SYMBOLS.forEach((symbol, index) => {
      if (!enabled[symbol.option]) return;
      const name = `smart-${symbol.name}`;
      inline.register(
        name,
        patternRule(name, symbol.pattern, () => ({ nodes: [text(symbol.replacement)] })),
        { priority: 60 + index },
      );
    });

    if (enabled.fractions) {
      inline.register(
        'smart-fraction',
        patternRule('smart-fraction', FRACTION_RE, (match) => {
          const glyph = FRACTIONS[match.groups[1]];
          return glyph ? { nodes: [text(glyph)] } : null;
        }),
        { priority: 70 },
      );
    }

    if (enabled.ordinalNumbers) {
      inline.register(
        'smart-ordinal',
        patternRule('smart-ordinal', ORDINAL_RE, (match) => {
          const [, digits, suffix] = match.groups;
          if (ordinalSuffix(Number(digits)) !== suffix) return null;
          return { nodes: [text(digits), element('sup', {}, [text(suffix)])] };
        }),
        { priority: 71 },
      );
    }
  },
});
