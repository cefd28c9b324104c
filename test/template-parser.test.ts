import { assert } from 'chai';

import {
  tplParse,
} from '../src/template-parser.js';

import {
  TemplateParseError,
} from '../src/template-error.js';

import type {
  TplNode,
} from '../src/types.js';

/**
 * Run the parser and return the thrown parse error.
 */
function parseError (tpl: string): TemplateParseError {
  try {
    tplParse(tpl);
  } catch (err) {
    if (err instanceof TemplateParseError) return err;
    throw err;
  }
  throw new Error(`expected a parse error for ${JSON.stringify(tpl)}`);
}

describe('template parser', function () {
  describe('nodes', function () {
    it('splits text and variables', function () {
      const expected: TplNode[] = [
        { type: 'text', value: 'Hello ' },
        { type: 'variable', name: 'name', mode: 'escape' },
        { type: 'text', value: '!' },
      ];
      assert.deepEqual(tplParse('Hello {{ name }}!'), expected);
    });

    it('keeps text without tags as a single node', function () {
      assert.deepEqual(tplParse('just text\n'), [ { type: 'text', value: 'just text\n' } ]);
    });

    it('returns no nodes for an empty template', function () {
      assert.deepEqual(tplParse(''), []);
    });

    it('recognizes raw variables in both notations', function () {
      const expected: TplNode[] = [
        { type: 'variable', name: 'a', mode: 'raw' },
        { type: 'variable', name: 'b', mode: 'raw' },
        { type: 'variable', name: 'c', mode: 'raw' },
      ];
      assert.deepEqual(tplParse('{{{a}}}{{& b }}{{ {c} }}'), expected);
    });

    it('drops a brace body without closing brace', function () {
      assert.deepEqual(tplParse('{{ {name }}'), []);
      assert.deepEqual(tplParse('a{{ {name }}b'), [
        { type: 'text', value: 'a' },
        { type: 'text', value: 'b' },
      ]);
    });

    it('drops comments', function () {
      const expected: TplNode[] = [
        { type: 'text', value: 'a' },
        { type: 'text', value: 'b' },
      ];
      assert.deepEqual(tplParse('a{{! a {{ note }}b'), expected);
    });

    it('builds nested sections with start lines', function () {
      const expected: TplNode[] = [
        { type: 'text', value: 'top\n' },
        {
          type: 'section',
          name: 'list',
          inverted: false,
          startLine: 2,
          children: [
            { type: 'text', value: '- ' },
            { type: 'variable', name: '.', mode: 'escape' },
            { type: 'text', value: '\n' },
            {
              type: 'section',
              name: 'empty',
              inverted: true,
              startLine: 4,
              children: [ { type: 'text', value: 'none' } ],
            },
          ],
        },
        { type: 'text', value: '\n' },
      ];
      assert.deepEqual(tplParse('top\n{{#list}}\n- {{.}}\n{{^ empty }}none{{/empty}}{{/list}}\n'), expected);
    });

    it('consumes a CRLF line break after a section opening tag', function () {
      const nodes = tplParse('{{#a}}\r\nX{{/a}}');
      assert.deepEqual(nodes, [
        { type: 'section', name: 'a', inverted: false, startLine: 1, children: [ { type: 'text', value: 'X' } ] },
      ]);
    });

    it('returns frozen node lists', function () {
      const nodes = tplParse('{{#a}}x{{/a}}');
      assert.isTrue(Object.isFrozen(nodes));
      const section = nodes[0];
      assert.strictEqual(section?.type, 'section');
      if (section?.type === 'section') assert.isTrue(Object.isFrozen(section.children));
    });

    it('accepts other delimiters', function () {
      const expected: TplNode[] = [
        { type: 'variable', name: 'name', mode: 'escape' },
        { type: 'text', value: ' {{x}}' },
      ];
      assert.deepEqual(tplParse('<% name %> {{x}}', '<%', '%>'), expected);
    });

    it('rejects empty delimiters', function () {
      assert.throws(() => tplParse('x', '', '}}'), TypeError, 'Invalid template delimiters');
    });
  });

  describe('errors', function () {
    it('reports an unmatched open tag with its line', function () {
      const err = parseError('one\ntwo {{name');
      assert.strictEqual(err.reason, 'unmatched-open-tag');
      assert.strictEqual(err.line, 2);
      assert.strictEqual(err.message, 'line 2: unmatched open tag');
    });

    it('reports a triple mustache closed with two braces as unmatched', function () {
      const err = parseError('{{{name}}');
      assert.strictEqual(err.reason, 'unmatched-open-tag');
      assert.strictEqual(err.line, 1);
    });

    it('reports a top-level close tag', function () {
      const err = parseError('a {{/x}}');
      assert.strictEqual(err.reason, 'unmatched-close-tag');
      assert.strictEqual(err.message, 'line 1: unmatched close tag: x');
    });

    it('reports an empty tag', function () {
      const err = parseError('a\n\nb{{  }}');
      assert.strictEqual(err.reason, 'empty-tag');
      assert.strictEqual(err.message, 'line 3: empty tag');
    });

    it('reports a mismatched closing tag naming both sections', function () {
      const err = parseError('a\nb\n{{#x}}\n{{/y}}');
      assert.strictEqual(err.reason, 'interleaved-close-tag');
      assert.strictEqual(err.message, 'line 4: interleaved closing tag: y (expected x)');
    });

    it('reports an unterminated section at its opening line', function () {
      const err = parseError('x\n{{#outer}}\n{{#inner}}body\nmore');
      assert.strictEqual(err.reason, 'unterminated-section');
      assert.strictEqual(err.line, 3);
      assert.strictEqual(err.message, 'line 3: section inner has no closing tag');
    });

    it('counts line breaks inside tags', function () {
      const err = parseError('{{!\ncomment\n}}{{/x}}');
      assert.strictEqual(err.line, 3);
    });

    it('is an Error subclass', function () {
      const err = parseError('{{');
      assert.instanceOf(err, Error);
      assert.strictEqual(err.name, 'TemplateParseError');
      assert.strictEqual(err.detail, 'unmatched open tag');
    });
  });
});
