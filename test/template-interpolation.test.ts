import { assert } from 'chai';

import {
  renderTemplate,
} from '../src/index.js';

describe('template rendering / variables', function () {
  it('renders a template without tags unchanged', function () {
    const tpl = 'plain text\nwith <b>markup</b> & "quotes" }}';
    assert.strictEqual(renderTemplate(tpl, { a: 1 }), tpl);
  });

  it('escapes by default', function () {
    assert.strictEqual(renderTemplate('{{v}}', { v: '<a&b>' }), '&lt;a&amp;b&gt;');
    assert.strictEqual(renderTemplate('{{v}}', { v: '"it\'s"' }), '&quot;it&apos;s&quot;');
  });

  it('raw variants insert as-is', function () {
    assert.strictEqual(renderTemplate('{{{v}}}', { v: '<b>' }), '<b>');
    assert.strictEqual(renderTemplate('{{&v}}', { v: '<b>' }), '<b>');
    assert.strictEqual(renderTemplate('{{{ v }}}|{{& v }}', { v: '<i>"x"</i>' }), '<i>"x"</i>|<i>"x"</i>');
  });

  it('unknown names render as empty string without aborting', function () {
    assert.strictEqual(renderTemplate('A{{missing}}B{{name}}C', { name: 'x' }), 'ABxC');
  });

  it('null and undefined values render as empty string', function () {
    assert.strictEqual(renderTemplate('[{{a}}][{{b}}]', { a: null, b: undefined }), '[][]');
  });

  it('a present null key shadows outer contexts and prints nothing', function () {
    assert.strictEqual(renderTemplate('[{{a}}][{{{a}}}]', { a: null }, { a: 'outer' }), '[][]');
  });

  it('stringifies non-strings', function () {
    const data = { n: 42, z: 0, f: 1.5, t: true, no: false, list: [ 1, 2 ] };
    assert.strictEqual(renderTemplate('{{n}} {{z}} {{f}} {{t}} {{no}} {{list}}', data), '42 0 1.5 true false 1,2');
  });

  it('a brace body without closing brace renders nothing', function () {
    assert.strictEqual(renderTemplate('a{{ {name }}b', { '{name': '<X>', name: 'N' }), 'ab');
  });

  it('whitespace tolerance inside braces', function () {
    assert.strictEqual(renderTemplate('{{   name   }}', { name: 'x' }), 'x');
  });

  it('searches root contexts in order', function () {
    assert.strictEqual(renderTemplate('{{a}}-{{b}}', { a: '1' }, { a: '2', b: '3' }), '1-3');
  });

  it('renders with no contexts at all', function () {
    assert.strictEqual(renderTemplate('x{{y}}z'), 'xz');
  });

  describe('dot-paths', function () {
    it('resolves nested records', function () {
      assert.strictEqual(renderTemplate('{{user.address.city}}', { user: { address: { city: 'Oslo' } } }), 'Oslo');
    });

    it('missing heads and scalar heads resolve to nothing', function () {
      assert.strictEqual(renderTemplate('[{{nope.name}}][{{title.length}}]', { title: 'abc' }), '[][]');
    });

    it('does not backtrack to outer contexts once the head resolved', function () {
      const tpl = '{{#inner}}[{{user.name}}]{{/inner}}';
      const data = { user: { name: 'Outer' }, inner: { user: {} } };
      assert.strictEqual(renderTemplate(tpl, data), '[]');
    });

    it('resolves the head through outer contexts', function () {
      const tpl = '{{#item}}{{owner.name}}{{/item}}';
      assert.strictEqual(renderTemplate(tpl, { item: { id: 1 }, owner: { name: 'Root' } }), 'Root');
    });
  });

  describe('value shapes', function () {
    it('looks up Map keys', function () {
      const data = new Map<string, unknown>([ [ 'k', 'v' ], [ 'nested', { x: 'y' } ] ]);
      assert.strictEqual(renderTemplate('{{k}}{{nested.x}}', data), 'vy');
    });

    it('looks up class instance fields', function () {
      class Person {
        name = 'Ann';
        age = 31;
      }
      assert.strictEqual(renderTemplate('{{name}} ({{age}})', new Person()), 'Ann (31)');
    });

    it('follows WeakRef values', function () {
      const target = { name: 'Ref' };
      const data = { user: new WeakRef(target), label: new WeakRef(target) };
      assert.strictEqual(renderTemplate('{{user.name}}', data), 'Ref');
      assert.strictEqual(renderTemplate('{{label}}', data), '[object Object]');
    });

    it('does not look into arrays by index', function () {
      assert.strictEqual(renderTemplate('[{{list.0}}][{{list.length}}]', { list: [ 'a' ] }), '[][]');
    });
  });
});
