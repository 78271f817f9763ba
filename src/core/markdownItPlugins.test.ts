import { describe, it, expect } from 'vitest';
import MarkdownIt from 'markdown-it';
import {
  admonitionPlugin,
  customFencesPlugin,
  mathPlugin,
  parseAdmonitionHeader,
  parseFenceInfo,
  spanPlugin,
  wikiEmojiPlugin,
} from './markdownItPlugins';
import { DefaultWikiRenderer, type EmojiMatch, type FenceMatch, type WikiRenderer } from './renderer';

describe('parseFenceInfo', () => {
  it('parses a bare language', () => {
    expect(parseFenceInfo('math')).toEqual({ language: 'math', id: '', classes: [], attrs: {} });
  });

  it('parses id, classes and bare attributes', () => {
    expect(parseFenceInfo('math {#eq1 .wide data-size=2}')).toEqual({
      language: 'math',
      id: 'eq1',
      classes: ['wide'],
      attrs: { 'data-size': '2' },
    });
  });

  it('parses quoted attribute values', () => {
    expect(parseFenceInfo(`csf {title="Hello world" .a data-x='y'}`)).toEqual({
      language: 'csf',
      id: '',
      classes: ['a'],
      attrs: { title: 'Hello world', 'data-x': 'y' },
    });
  });

  it('allows the brace right after the language', () => {
    expect(parseFenceInfo('math{.x}').classes).toEqual(['x']);
    expect(parseFenceInfo('math{.x}').language).toBe('math');
  });

  it('tolerates a missing closing brace', () => {
    expect(parseFenceInfo('math {.a').classes).toEqual(['a']);
  });

  it('returns empty values for an empty info string', () => {
    expect(parseFenceInfo('')).toEqual({ language: '', id: '', classes: [], attrs: {} });
  });
});

describe('parseAdmonitionHeader', () => {
  it('derives the title from the type', () => {
    expect(parseAdmonitionHeader('!!! note')).toEqual({ kind: 'note', title: 'Note' });
  });

  it('uses an explicit title', () => {
    expect(parseAdmonitionHeader('!!! tip "Read me"')).toEqual({ kind: 'tip', title: 'Read me' });
  });

  it('drops the title for an empty string', () => {
    expect(parseAdmonitionHeader('!!! warning ""')).toEqual({ kind: 'warning', title: null });
  });

  it('lower-cases extra classes', () => {
    expect(parseAdmonitionHeader('!!! Danger highlight')).toEqual({
      kind: 'danger highlight',
      title: 'Danger',
    });
  });

  it('accepts a missing space after the marker', () => {
    expect(parseAdmonitionHeader('!!!note')).toEqual({ kind: 'note', title: 'Note' });
  });

  it('rejects headers without a type', () => {
    expect(parseAdmonitionHeader('!!!')).toBeNull();
    expect(parseAdmonitionHeader('!!! "Title only"')).toBeNull();
  });
});

describe('admonitionPlugin', () => {
  const md = new MarkdownIt().use(admonitionPlugin);

  it('renders title and indented body', () => {
    expect(md.render('!!! note\n    Body text.\n')).toBe(
      '<div class="admonition note">\n<p class="admonition-title">Note</p>\n<p>Body text.</p>\n</div>\n',
    );
  });

  it('omits the title paragraph for an empty title', () => {
    expect(md.render('!!! warning ""\n    Careful.\n')).toBe(
      '<div class="admonition warning">\n<p>Careful.</p>\n</div>\n',
    );
  });

  it('parses block content in the body', () => {
    expect(md.render('!!! note\n    - a\n    - b\n')).toBe(
      '<div class="admonition note">\n<p class="admonition-title">Note</p>\n<ul>\n<li>a</li>\n<li>b</li>\n</ul>\n</div>\n',
    );
  });

  it('ends the body at the first line indented less than four spaces', () => {
    expect(md.render('!!! note\n    Body\n\nAfter')).toBe(
      '<div class="admonition note">\n<p class="admonition-title">Note</p>\n<p>Body</p>\n</div>\n<p>After</p>\n',
    );
  });
});

describe('mathPlugin', () => {
  const md = new MarkdownIt().use(mathPlugin, { cssClass: 'arithmatex' });

  it('renders inline math as a span', () => {
    expect(md.render('Euler: $e^{i\\pi}+1=0$')).toBe(
      '<p>Euler: <span class="arithmatex">e^{i\\pi}+1=0</span></p>\n',
    );
  });

  it('escapes math content', () => {
    expect(md.render('$a<b$')).toBe('<p><span class="arithmatex">a&lt;b</span></p>\n');
  });

  it('leaves prices alone', () => {
    expect(md.render('costs $5 and $6')).toBe('<p>costs $5 and $6</p>\n');
  });

  it('renders a $$ block as a div', () => {
    expect(md.render('$$\na + b\n$$')).toBe('<div class="arithmatex">a + b</div>\n');
  });

  it('renders a single-line $$ block', () => {
    expect(md.render('$$x^2$$')).toBe('<div class="arithmatex">x^2</div>\n');
  });

  it('treats an unclosed block as text', () => {
    expect(md.render('$$\nx')).toBe('<p>$$\nx</p>\n');
  });

  it('ends an unclosed block at the first blank line', () => {
    expect(md.render('$$\nunclosed\n\nSome paragraph\n\n$$\nx\n$$')).toBe(
      '<p>$$\nunclosed</p>\n<p>Some paragraph</p>\n<div class="arithmatex">x</div>\n',
    );
  });

  it('does not look inside code spans', () => {
    expect(md.render('`$x$`')).toBe('<p><code>$x$</code></p>\n');
  });
});

describe('spanPlugin', () => {
  const md = new MarkdownIt()
    .use(spanPlugin, { name: 'ins', marker: '^^', tag: 'ins', allowSpaces: true })
    .use(spanPlugin, { name: 'mark', marker: '==', tag: 'mark', allowSpaces: true })
    .use(spanPlugin, { name: 'sup', marker: '^', tag: 'sup', allowSpaces: false })
    .use(spanPlugin, { name: 'sub', marker: '~', tag: 'sub', allowSpaces: false });

  it('renders marked text', () => {
    expect(md.render('a ==marked text== b')).toBe('<p>a <mark>marked text</mark> b</p>\n');
  });

  it('renders inserted text', () => {
    expect(md.render('^^ins^^')).toBe('<p><ins>ins</ins></p>\n');
  });

  it('renders superscript and subscript', () => {
    expect(md.render('x^2^')).toBe('<p>x<sup>2</sup></p>\n');
    expect(md.render('H~2~O')).toBe('<p>H<sub>2</sub>O</p>\n');
  });

  it('keeps strikethrough working', () => {
    expect(md.render('~~del~~')).toBe('<p><s>del</s></p>\n');
  });

  it('rejects whitespace in superscript', () => {
    expect(md.render('x^a b^')).toBe('<p>x^a b^</p>\n');
  });

  it('parses inline markup inside a span', () => {
    expect(md.render('==a ^b^==')).toBe('<p><mark>a <sup>b</sup></mark></p>\n');
  });
});

describe('wikiEmojiPlugin', () => {
  const md = new MarkdownIt().use(wikiEmojiPlugin, { renderer: new DefaultWikiRenderer() });

  it('renders shortcodes as placeholders', () => {
    expect(md.render(':smile:')).toBe(
      '<p><x-emoji data-shortname="smile" data-unicode="1f604">\u{1F604}</x-emoji></p>\n',
    );
  });

  it('leaves ASCII shortcuts as text', () => {
    expect(md.render('I <3 it :) and 8-) and :D')).toBe(
      '<p>I &lt;3 it :) and 8-) and :D</p>\n',
    );
  });

  it('leaves unknown shortcodes as text', () => {
    expect(md.render(':not_an_emoji:')).toBe('<p>:not_an_emoji:</p>\n');
  });

  it('hands the match to the renderer', () => {
    const matches: EmojiMatch[] = [];
    const recorder: WikiRenderer = {
      emoji: (match) => {
        matches.push(match);
        return '[emoji]';
      },
      fence: () => '',
    };
    const recording = new MarkdownIt().use(wikiEmojiPlugin, { renderer: recorder });

    expect(recording.render('hi :smile:')).toBe('<p>hi [emoji]</p>\n');
    expect(matches).toEqual([{ shortname: 'smile', codepoint: '1f604', fallback: ':smile:' }]);
  });
});

describe('customFencesPlugin', () => {
  const fences = [
    { name: 'math', cssClass: 'arithmatex' },
    { name: 'csf', cssClass: 'csf' },
  ];
  const md = new MarkdownIt().use(customFencesPlugin, {
    fences,
    renderer: new DefaultWikiRenderer(),
  });

  it('renders a math fence as a div', () => {
    expect(md.render('```math\nx^2\n```')).toBe('<div class="arithmatex">x^2</div>\n');
  });

  it('passes wiki markup through verbatim', () => {
    expect(md.render('```csf\n<ac:structured-macro ac:name="toc"/>\n```')).toBe(
      '<div class="csf"><ac:structured-macro ac:name="toc"/></div>\n',
    );
  });

  it('applies the attribute list', () => {
    expect(md.render('```math {#eq .wide}\na\n```')).toBe(
      '<div id="eq" class="arithmatex wide">a</div>\n',
    );
  });

  it('keeps the default output for other fences', () => {
    expect(md.render('```js\nlet a = 1;\n```')).toBe(
      '<pre><code class="language-js">let a = 1;\n</code></pre>\n',
    );
    expect(md.render('```\ncode\n```')).toBe('<pre><code>code\n</code></pre>\n');
  });

  it('hands the parsed fence to the renderer', () => {
    const matches: FenceMatch[] = [];
    const recorder: WikiRenderer = {
      emoji: () => '',
      fence: (match) => {
        matches.push(match);
        return '<div>fence</div>';
      },
    };
    const recording = new MarkdownIt().use(customFencesPlugin, { fences, renderer: recorder });

    expect(recording.render('```csf {data-k=v}\nline 1\nline 2\n```')).toBe('<div>fence</div>\n');
    expect(matches).toEqual([
      {
        source: 'line 1\nline 2',
        language: 'csf',
        cssClass: 'csf',
        id: '',
        classes: [],
        attrs: { 'data-k': 'v' },
      },
    ]);
  });
});
