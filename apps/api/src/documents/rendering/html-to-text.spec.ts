import { htmlToText } from './html-to-text';

describe('htmlToText', () => {
  it('turns contract HTML into marked-up lines', () => {
    const html = [
      '<h1>TITLE</h1>',
      '<p>Hello <strong>World</strong> &amp; co.</p>',
      '<ul>',
      '<li>One</li>',
      '<li>Two</li>',
      '</ul>',
      '<hr>',
      '<p>End</p>',
    ].join('\n');

    expect(htmlToText(html)).toBe(
      '# TITLE\nHello World & co.\n\n- One\n\n- Two\n\n---\nEnd',
    );
  });

  it('joins source line breaks inside a paragraph', () => {
    expect(htmlToText('<p>This lease runs\n   for <strong>12 months</strong>.</p>')).toBe(
      'This lease runs for 12 months.',
    );
  });

  it('drops scripts and styles', () => {
    expect(htmlToText('<style>p { color: red }</style><p>Body</p><script>alert(1)</script>')).toBe(
      'Body',
    );
  });

  it('decodes entities once', () => {
    expect(htmlToText('<p>&amp;lt;tag&amp;gt; &quot;q&quot; &#39;s&#39;</p>')).toBe(
      `&lt;tag&gt; "q" 's'`,
    );
  });
});
