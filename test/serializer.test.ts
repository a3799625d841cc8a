import { describe, expect, it } from 'vitest';
import { renderRun } from '../src/hwpx/builders/paragraph.js';
import { renderSectionXml } from '../src/hwpx/builders/section.js';
import { serialize } from '../src/hwpx/builders/serialize.js';
import { HwpxDocument, resolvePageSetup } from '../src/hwpx/document.js';
import { HwpxError, HwpxErrorCode } from '../src/hwpx/errors.js';
import { DEFAULT_REGISTRY } from '../src/hwpx/registry.js';
import type { BodyBlock, Run } from '../src/hwpx/types.js';
import { childElements, hp, parseXml, pngBytes } from './fixtures.js';

function sectionOf(doc: HwpxDocument): Document {
  return parseXml(doc.serialize().section);
}

/** Top-level paragraphs of the section. */
function bodyParagraphs(section: Document): Element[] {
  return childElements(section.documentElement).filter((el) => el.localName === 'p');
}

function names(el: Element): string[] {
  return childElements(el).map((c) => c.localName);
}

function build(seed: number): HwpxDocument {
  const doc = new HwpxDocument({ seed });
  doc.addHeading('Report');
  doc.addParagraph([{ text: 'see ' }, { text: 'docs', link: 'https://example.test/docs' }]);
  doc.addTable(['a', 'b'], [['1', '2']]);
  doc.addImage(pngBytes(40, 20));
  doc.setFooter('{page}');
  return doc;
}

describe('section0.xml', () => {
  it('starts with the declaration and the section root', () => {
    const xml = new HwpxDocument().serialize().section;
    expect(xml.split('\n')[0]).toBe('<?xml version="1.0" encoding="utf-8"?>');
    expect(xml.split('\n')[1]).toBe(
      '<hs:sec xmlns:hp="http://www.hancom.co.kr/hwpml/2011/paragraph" xmlns:hs="http://www.hancom.co.kr/hwpml/2011/section" xmlns:hc="http://www.hancom.co.kr/hwpml/2011/core">',
    );
  });

  it('writes one carrier paragraph for an empty document', () => {
    const paragraphs = bodyParagraphs(sectionOf(new HwpxDocument()));
    expect(paragraphs).toHaveLength(1);
    const [run] = childElements(paragraphs[0]);
    expect(names(run)).toEqual(['secPr', 'ctrl']);
  });

  it('puts page setup into the first run of a leading text paragraph', () => {
    const doc = new HwpxDocument();
    doc.addHeading('Report');
    const paragraphs = bodyParagraphs(sectionOf(doc));
    expect(paragraphs).toHaveLength(1);
    expect(paragraphs[0].getAttribute('paraPrIDRef')).toBe('1');
    expect(paragraphs[0].getAttribute('styleIDRef')).toBe('1');
    const [run] = childElements(paragraphs[0]);
    expect(run.getAttribute('charPrIDRef')).toBe('4');
    expect(names(run)).toEqual(['secPr', 'ctrl', 't']);
    expect(hp(sectionOf(doc), 't')[0].textContent).toBe('Report');
  });

  it('adds a carrier paragraph before a leading table', () => {
    const doc = new HwpxDocument();
    doc.addTable(['a'], [['b']]);
    const paragraphs = bodyParagraphs(sectionOf(doc));
    expect(paragraphs).toHaveLength(2);
    expect(names(childElements(paragraphs[0])[0])).toEqual(['secPr', 'ctrl']);
    expect(names(childElements(paragraphs[1])[0])).toEqual(['tbl']);
  });

  it('writes page size and orientation', () => {
    const portrait = hp(sectionOf(new HwpxDocument()), 'pagePr')[0];
    expect(portrait.getAttribute('landscape')).toBe('WIDELY');
    expect(portrait.getAttribute('width')).toBe('59530');
    expect(portrait.getAttribute('height')).toBe('84190');

    const landscape = hp(sectionOf(new HwpxDocument({ page: { landscape: true } })), 'pagePr')[0];
    expect(landscape.getAttribute('landscape')).toBe('NARROWLY');
    expect(landscape.getAttribute('width')).toBe('84190');

    const margin = hp(sectionOf(new HwpxDocument({ page: { margins: { left: 1000 } } })), 'margin')[0];
    expect(margin.getAttribute('left')).toBe('1000');
    expect(margin.getAttribute('right')).toBe('8504');
  });

  it('renders a 3x3 table grid', () => {
    const doc = new HwpxDocument({ seed: 11 });
    const block = doc.addTable(
      ['h1', 'h2', 'h3'],
      [
        ['a', 'b', 'c'],
        ['d', 'e', 'f'],
      ],
    );
    const section = sectionOf(doc);
    const [tbl] = hp(section, 'tbl');
    expect(tbl.getAttribute('rowCnt')).toBe('3');
    expect(tbl.getAttribute('colCnt')).toBe('3');
    expect(tbl.getAttribute('id')).toBe(String(block.id));
    expect(tbl.getAttribute('borderFillIDRef')).toBe('3');
    expect(hp(section, 'tr')).toHaveLength(3);

    const cells = hp(section, 'tc');
    expect(cells).toHaveLength(9);
    expect(cells[0].getAttribute('header')).toBe('1');
    expect(cells[0].getAttribute('borderFillIDRef')).toBe('4');
    expect(cells[8].getAttribute('header')).toBe('0');
    expect(cells[8].getAttribute('borderFillIDRef')).toBe('3');

    const addr = hp(section, 'cellAddr')[5];
    expect([addr.getAttribute('rowAddr'), addr.getAttribute('colAddr')]).toEqual(['1', '2']);
    expect(hp(section, 'subList')[0].getAttribute('id')).toBe(String(block.rows[0][0].subListId));
    expect(hp(section, 'outMargin')[0].getAttribute('bottom')).toBe('1417');
  });

  it('escapes text content', () => {
    const doc = new HwpxDocument();
    doc.addParagraph('a < b & c > d');
    expect(doc.serialize().section).toContain('<hp:t>a &lt; b &amp; c &gt; d</hp:t>');
    expect(hp(sectionOf(doc), 't')[0].textContent).toBe('a < b & c > d');
  });

  it('recovers a URL with quotes, angle brackets and ampersands', () => {
    const url = 'https://example.test/?q="x"<y>&z=1';
    const doc = new HwpxDocument({ seed: 4 });
    doc.addParagraph([{ text: 'link', link: url }]);
    const section = sectionOf(doc);

    const params = hp(section, 'stringParam');
    const path = params.find((p) => p.getAttribute('name') === 'Path');
    const command = params.find((p) => p.getAttribute('name') === 'Command');
    expect(path?.textContent).toBe(url);
    expect(command?.textContent).toBe('https\\://example.test/?q="x"<y>&z=1;1;0;0;');

    const [begin] = hp(section, 'fieldBegin');
    const [end] = hp(section, 'fieldEnd');
    expect(begin.getAttribute('type')).toBe('HYPERLINK');
    expect(end.getAttribute('beginIDRef')).toBe(begin.getAttribute('id'));
  });

  it('writes header and footer controls into the first run', () => {
    const doc = new HwpxDocument();
    doc.addParagraph('body');
    doc.setHeader('Title');
    doc.setFooter('Page {page}');
    const section = sectionOf(doc);

    const [header] = hp(section, 'header');
    const [footer] = hp(section, 'footer');
    expect(header.getAttribute('applyPageType')).toBe('BOTH');
    expect(String(header.getAttribute('id'))).toBe(String(doc.header?.id));

    const [headerList, footerList] = hp(section, 'subList');
    expect(headerList.getAttribute('vertAlign')).toBe('TOP');
    expect(headerList.getAttribute('hasNumRef')).toBe('0');
    expect(headerList.getAttribute('textWidth')).toBe(String(59530 - 17008));
    expect(footerList.getAttribute('vertAlign')).toBe('BOTTOM');
    expect(footerList.getAttribute('hasNumRef')).toBe('1');
    expect(hp(section, 'autoNum')[0].getAttribute('numType')).toBe('PAGE');
    expect(footer.parentNode?.parentNode?.nodeName).toBe('hp:run');
  });

  it('renders an inline picture', () => {
    const doc = new HwpxDocument({ seed: 8 });
    doc.addParagraph('before');
    const block = doc.addImage(pngBytes(40, 20), { alt: 'logo' });
    const section = sectionOf(doc);

    const [pic] = hp(section, 'pic');
    expect(pic.getAttribute('id')).toBe(String(block.picId));
    expect(pic.getAttribute('instid')).toBe(String(block.instId));
    expect(hp(section, 'pos')[0].getAttribute('treatAsChar')).toBe('1');
    expect(hp(section, 'curSz')[0].getAttribute('width')).toBe('3000');
    expect(hp(section, 'shapeComment')[0].textContent).toBe('logo');
    const [img] = Array.from(section.getElementsByTagNameNS('http://www.hancom.co.kr/hwpml/2011/core', 'img'));
    expect(img.getAttribute('binaryItemIDRef')).toBe('image1');
  });

  it('is byte-stable for a seed and differs only in structural IDs across seeds', () => {
    const a = build(42).serialize();
    const b = build(42).serialize();
    const c = build(43).serialize();
    expect(a).toEqual(b);
    expect(c.header).toBe(a.header);
    expect(c.section).not.toBe(a.section);
    const masked = (xml: string): string => xml.replace(/\b\d{9}\b/g, 'ID');
    expect(masked(c.section)).toBe(masked(a.section));
  });

  it('rejects an unknown block kind', () => {
    const bogus: BodyBlock = JSON.parse('{"kind":"chart","paraPrId":0,"runs":[]}');
    let caught: unknown;
    try {
      renderSectionXml({ blocks: [bogus], pageSetup: resolvePageSetup() });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(HwpxError);
    expect(caught).toMatchObject({ code: HwpxErrorCode.UNKNOWN_BLOCK_KIND, message: 'Unrecognized block kind: chart' });
  });

  it('rejects an unknown run kind', () => {
    const bogus: Run = JSON.parse('{"kind":"sparkle","charPrId":0}');
    expect(() => renderRun(bogus)).toThrow('Unrecognized run kind: sparkle');
  });

  it('writes block IDs as the model holds them', () => {
    const block: BodyBlock = { kind: 'paragraph', paraPrId: 99, runs: [] };
    const { section } = serialize(DEFAULT_REGISTRY, { blocks: [block], pageSetup: resolvePageSetup() });
    expect(section).toContain('<hp:p paraPrIDRef="99" styleIDRef="0" pageBreak="0" columnBreak="0" merged="0">');
  });
});
