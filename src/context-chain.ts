import type {
  TplContextChain,
} from './types.js';

/**
 * Prepend a value to a chain. The given chain is left untouched, so sibling
 * section passes never see each other's entry.
 *
 * @param chain - Existing chain.
 * @param value - New nearest entry.
 * @returns Extended chain.
 */
export const tplChainPush = (chain: TplContextChain, value: unknown): TplContextChain => ({ value, next: chain });

/**
 * Build a chain from root values. The first value becomes the nearest entry.
 *
 * @param values - Root context values, nearest first.
 * @returns Chain with one entry per value.
 */
export const tplChainFrom = (values: readonly unknown[]): TplContextChain => {
  let chain: TplContextChain = null;
  for (let i = values.length - 1; i >= 0; i--) {
    chain = tplChainPush(chain, values[i]);
  }
  return chain;
};

/**
 * Nearest entry of a chain, or undefined for the empty chain.
 */
export const tplChainHead = (chain: TplContextChain): unknown => chain?.value;

/**
 * Iterate chain entries, nearest first.
 */
export function * tplChainEntries (chain: TplContextChain): Generator<unknown> {
  for (let link = chain; link; link = link.next) {
    yield link.value;
  }
}
