/**
 * Element and attribute matchers for ShindanMaker pages, built once at module load.
 */

export const TITLE_ATTRIBUTE = 'data-shindan_title';
export const BLOCKS_ATTRIBUTE = 'data-blocks';

export const SELECTORS = Object.freeze({
  title: '#shindanTitle',
  description: '#shindanDescriptionDisplay',
  result: '#shindanResult',
  titleAndResult: '#title_and_result',
  script: 'script',
  partsInputs: 'input[name^="parts["]',
  tokenInputs: Object.freeze({
    _token: 'input[name="_token"]',
    randname: 'input[name="randname"]',
    type: 'input[name="type"]',
    shindan_token: 'input[name="shindan_token"]',
  }),
  /** Animated result wrappers, each followed by a <noscript> fallback. */
  effects: Object.freeze([
    'span.shindanEffects[data-mode="ef_typing"]',
    'span.shindanEffects[data-mode="ef_shuffle"]',
  ]),
} as const);

export type TokenFieldName = keyof typeof SELECTORS.tokenInputs;
