import { TemplatesService } from '../../templates/templates.service';
import {
  TEMPLATE_MODEL,
  TemplateContractGenerator,
  escapeHtml,
  fillPlaceholders,
} from './template-contract-generator';

describe('fillPlaceholders', () => {
  it('substitutes values and marks missing ones', () => {
    const { content, missing } = fillPlaceholders(
      '<p>{{buyer}} pays {{seller}} by {{ due }}.</p>',
      { buyer: 'Jane', seller: '' },
    );

    expect(content).toBe('<p>Jane pays [seller] by [due].</p>');
    expect(missing).toEqual(['seller', 'due']);
  });

  it('formats number placeholders with grouping and no decimals', () => {
    const { content } = fillPlaceholders('{{fee:number}} / {{rent:number}} / {{x:number}}', {
      fee: 1500000,
      rent: '2500.7',
      x: 'n/a',
    });

    expect(content).toBe('1,500,000 / 2,501 / n/a');
  });

  it('escapes HTML in values', () => {
    const { content } = fillPlaceholders('<strong>{{name}}</strong>', {
      name: 'Smith & Sons <Ltd>',
    });

    expect(content).toBe('<strong>Smith &amp; Sons &lt;Ltd&gt;</strong>');
  });

  it('reports a repeated missing placeholder once', () => {
    expect(fillPlaceholders('{{a}} {{a}}', {}).missing).toEqual(['a']);
  });
});

describe('escapeHtml', () => {
  it('escapes quotes', () => {
    expect(escapeHtml(`"it's"`)).toBe('&quot;it&#39;s&quot;');
  });
});

describe('TemplateContractGenerator', () => {
  const generator = new TemplateContractGenerator(new TemplatesService());

  it('fills the contract type body', async () => {
    const generated = await generator.generate({
      contractType: 'NDA',
      jurisdiction: 'US',
      inputs: {
        disclosing_party: 'Acme Corp',
        receiving_party: 'Jane Roe',
        confidential_subject: 'Product roadmap',
      },
    });

    expect(generated.model).toBe(TEMPLATE_MODEL);
    expect(generated.content).toContain(
      '<p>This agreement is made between <strong>Acme Corp</strong> (Disclosing Party)',
    );
    expect(generated.content).toContain('<p>Product roadmap</p>');
    expect(generated.content).toContain('<strong>[duration]</strong>');
    expect(generated.missingPlaceholders).toEqual(['duration']);
  });

  it('uses the default body for types without one', async () => {
    const generated = await generator.generate({
      contractType: 'SALE',
      jurisdiction: 'US',
      inputs: { seller_name: 'Acme Corp' },
    });

    expect(generated.content).toContain('<h1>AGREEMENT</h1>');
    expect(generated.missingPlaceholders).toEqual([]);
  });

  describe('revise', () => {
    const NOTE = (text: string) =>
      `<section class="revision-note"><p><em>Revised per feedback: ${text}</em></p></section>`;

    it('keeps the content and appends the feedback as a note', async () => {
      const revised = await generator.revise({
        contractType: 'NDA',
        content: '<h1>NDA</h1><p>Body</p>',
        feedback: ' Shorten clause <2> ',
        preserveStructure: true,
        jurisdiction: 'US',
      });

      expect(revised.content).toBe(`<h1>NDA</h1><p>Body</p>\n${NOTE('Shorten clause &lt;2&gt;')}`);
      expect(revised.missingPlaceholders).toEqual([]);
      expect(revised.model).toBe(TEMPLATE_MODEL);
    });

    it('replaces the note of an earlier revision', async () => {
      const first = await generator.revise({
        contractType: 'NDA',
        content: '<p>Body</p>',
        feedback: 'first pass',
        preserveStructure: true,
        jurisdiction: 'US',
      });

      const second = await generator.revise({
        contractType: 'NDA',
        content: first.content,
        feedback: 'second pass',
        preserveStructure: true,
        jurisdiction: 'US',
      });

      expect(second.content).toBe(`<p>Body</p>\n${NOTE('second pass')}`);
    });

    it('starts again from the template when the structure is not kept', async () => {
      const revised = await generator.revise({
        contractType: 'SALE',
        content: '<p>Old text</p>',
        feedback: 'Start over',
        preserveStructure: false,
        jurisdiction: 'US',
      });

      expect(revised.content.startsWith('<h1>AGREEMENT</h1>')).toBe(true);
      expect(revised.content).not.toContain('Old text');
      expect(revised.content.endsWith(NOTE('Start over'))).toBe(true);
    });
  });
});
