import { JSDOM } from 'jsdom';

/**
 * Parse an HTML fragment with a real HTML parser and return its container element.
 */
export function parseHtmlFragment (html: string): HTMLElement {
  const dom = new JSDOM('<!doctype html><html><body></body></html>');
  const container = dom.window.document.createElement('div');
  container.innerHTML = html;
  return container;
}
