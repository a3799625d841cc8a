/**
 * Definitions payload (Contents/header.xml).
 *
 * One render function per element kind. Attribute order is written out
 * literally and must not be generated from object keys.
 */

import { NAMESPACES } from '../constants.js';
import type { Registry } from '../registry.js';
import type {
    BorderFillRecord,
    BorderLine,
    BulletRecord,
    CharPropertyRecord,
    FontFaceRecord,
    FontRef,
    NumberingRecord,
    ParaHeadRecord,
    ParaPropertyRecord,
    StyleRecord,
} from '../types.js';
import { escapeXmlAttr, toCharRef } from '../utils/escaping.js';

const flag = (value: boolean): string => (value ? '1' : '0');

export function renderFontFace(face: FontFaceRecord): string {
    const lines = [`      <hh:fontface lang="${face.lang}" fontCnt="${face.fonts.length}">`];
    for (const font of face.fonts) {
        lines.push(`        <hh:font id="${font.id}" face="${escapeXmlAttr(font.face)}" type="${font.type}" isEmbedded="0" />`);
    }
    lines.push('      </hh:fontface>');
    return lines.join('\n');
}

function renderBorderLine(tag: string, line: BorderLine): string {
    return `        <hh:${tag} type="${line.type}" width="${line.width}" color="${line.color}" />`;
}

export function renderBorderFill(fill: BorderFillRecord): string {
    return [
        `      <hh:borderFill id="${fill.id}" threeD="0" shadow="0" centerLine="NONE" breakCellSeparateLine="0">`,
        '        <hh:slash type="NONE" Crooked="0" isCounter="0" />',
        '        <hh:backSlash type="NONE" Crooked="0" isCounter="0" />',
        renderBorderLine('leftBorder', fill.left),
        renderBorderLine('rightBorder', fill.right),
        renderBorderLine('topBorder', fill.top),
        renderBorderLine('bottomBorder', fill.bottom),
        '        <hh:diagonal type="SOLID" width="0.1 mm" color="#000000" />',
        '        <hc:fillBrush>',
        `          <hc:winBrush faceColor="${fill.fillColor ?? 'none'}" hatchColor="#000000" alpha="0" />`,
        '        </hc:fillBrush>',
        '      </hh:borderFill>',
    ].join('\n');
}

function langAttrs(ref: FontRef): string {
    return (
        `hangul="${ref.hangul}" latin="${ref.latin}" hanja="${ref.hanja}" japanese="${ref.japanese}"` +
        ` other="${ref.other}" symbol="${ref.symbol}" user="${ref.user}"`
    );
}

const ALL_100 = 'hangul="100" latin="100" hanja="100" japanese="100" other="100" symbol="100" user="100"';
const ALL_0 = 'hangul="0" latin="0" hanja="0" japanese="0" other="0" symbol="0" user="0"';

export function renderCharPr(cp: CharPropertyRecord): string {
    const lines = [
        `      <hh:charPr id="${cp.id}" height="${cp.height}" textColor="${cp.textColor}" shadeColor="${cp.shadeColor}"` +
            ` useFontSpace="0" useKerning="0" symMark="NONE" borderFillIDRef="${cp.borderFillIdRef}">`,
        `        <hh:fontRef ${langAttrs(cp.fontRef)} />`,
        `        <hh:ratio ${ALL_100} />`,
        `        <hh:spacing ${ALL_0} />`,
        `        <hh:relSz ${ALL_100} />`,
        `        <hh:offset ${ALL_0} />`,
    ];
    if (cp.bold) lines.push('        <hh:bold />');
    if (cp.italic) lines.push('        <hh:italic />');
    lines.push(
        `        <hh:underline type="${cp.underline.type}" shape="SOLID" color="${cp.underline.color}" />`,
        `        <hh:strikeout shape="${cp.strikeout}" color="#000000" />`,
        '        <hh:outline type="NONE" />',
        '        <hh:shadow type="NONE" color="#C0C0C0" offsetX="5" offsetY="5" />',
        '      </hh:charPr>',
    );
    return lines.join('\n');
}

function renderParaSpacing(pp: ParaPropertyRecord, indent: string): string[] {
    const m = pp.margin;
    return [
        `${indent}<hh:margin>`,
        `${indent}  <hc:intent value="${m.intent}" unit="HWPUNIT" />`,
        `${indent}  <hc:left value="${m.left}" unit="HWPUNIT" />`,
        `${indent}  <hc:right value="${m.right}" unit="HWPUNIT" />`,
        `${indent}  <hc:prev value="${m.prev}" unit="HWPUNIT" />`,
        `${indent}  <hc:next value="${m.next}" unit="HWPUNIT" />`,
        `${indent}</hh:margin>`,
        `${indent}<hh:lineSpacing type="PERCENT" value="${pp.lineSpacing}" unit="HWPUNIT" />`,
    ];
}

export function renderParaPr(pp: ParaPropertyRecord): string {
    return [
        `      <hh:paraPr id="${pp.id}" tabPrIDRef="${pp.tabPrIdRef}" condense="0" fontLineHeight="0" snapToGrid="1"` +
            ' suppressLineNumbers="0" checked="0">',
        `        <hh:align horizontal="${pp.align}" vertical="BASELINE" />`,
        `        <hh:heading type="${pp.heading.type}" idRef="${pp.heading.idRef}" level="${pp.heading.level}" />`,
        '        <hh:breakSetting breakLatinWord="KEEP_WORD" breakNonLatinWord="BREAK_WORD" widowOrphan="0"' +
            ` keepWithNext="${flag(pp.keepWithNext)}" keepLines="${flag(pp.keepLines)}" pageBreakBefore="0" lineWrap="BREAK" />`,
        '        <hh:autoSpacing eAsianEng="0" eAsianNum="0" />',
        '        <hp:switch>',
        '          <hp:case hp:required-namespace="http://www.hancom.co.kr/hwpml/2016/HwpUnitChar">',
        ...renderParaSpacing(pp, '            '),
        '          </hp:case>',
        '          <hp:default>',
        ...renderParaSpacing(pp, '            '),
        '          </hp:default>',
        '        </hp:switch>',
        `        <hh:border borderFillIDRef="${pp.borderFillIdRef}" offsetLeft="400" offsetRight="400" offsetTop="100"` +
            ' offsetBottom="100" connect="0" ignoreMargin="0" />',
        '      </hh:paraPr>',
    ].join('\n');
}

export function renderStyle(style: StyleRecord): string {
    return (
        `      <hh:style id="${style.id}" type="${style.type}" name="${escapeXmlAttr(style.name)}"` +
        ` engName="${escapeXmlAttr(style.engName)}" paraPrIDRef="${style.paraPrIdRef}" charPrIDRef="${style.charPrIdRef}"` +
        ` nextStyleIDRef="${style.nextStyleIdRef}" langID="${style.langId}" lockForm="0" />`
    );
}

function renderParaHead(head: ParaHeadRecord): string {
    return (
        `        <hh:paraHead start="1" level="${head.level}" align="LEFT" useInstWidth="1"` +
        ` autoIndent="${flag(head.autoIndent)}" widthAdjust="0" textOffsetType="PERCENT" textOffset="${head.textOffset}"` +
        ` numFormat="${head.numFormat}" charPrIDRef="${head.charPrIdRef}" checkable="0" />`
    );
}

export function renderNumbering(numbering: NumberingRecord): string {
    return [
        `      <hh:numbering id="${numbering.id}" start="${numbering.start}">`,
        ...numbering.paraHeads.map(renderParaHead),
        '      </hh:numbering>',
    ].join('\n');
}

export function renderBullet(bullet: BulletRecord): string {
    return [
        `      <hh:bullet id="${bullet.id}" char="${toCharRef(bullet.char)}" checkedChar="${toCharRef(bullet.checkedChar)}">`,
        ...bullet.paraHeads.map(renderParaHead),
        '      </hh:bullet>',
    ].join('\n');
}

function renderList<T>(tag: string, items: readonly T[], render: (item: T) => string, indent: string = '    '): string[] {
    return [`${indent}<hh:${tag} itemCnt="${items.length}">`, ...items.map(render), `${indent}</hh:${tag}>`];
}

/** The complete header.xml document for `registry`. */
export function renderHeaderXml(registry: Registry): string {
    return [
        `<hh:head xmlns:hc="${NAMESPACES.HC}" xmlns:hh="${NAMESPACES.HH}" xmlns:hp="${NAMESPACES.HP}" version="1.5" secCnt="1">`,
        '  <hh:beginNum page="1" footnote="1" endnote="1" pic="1" tbl="1" equation="1" />',
        '  <hh:refList>',
        ...renderList('fontfaces', registry.fontFaces, renderFontFace),
        ...renderList('borderFills', registry.borderFills, renderBorderFill),
        ...renderList('charProperties', registry.charProperties, renderCharPr),
        ...renderList('paraProperties', registry.paraProperties, renderParaPr),
        '    <hh:tabProperties itemCnt="2">',
        '      <hh:tabPr id="0" autoTabLeft="0" autoTabRight="0" />',
        '      <hh:tabPr id="1" autoTabLeft="1" autoTabRight="0" />',
        '    </hh:tabProperties>',
        ...renderList('numberings', registry.numberings, renderNumbering),
        ...renderList('bullets', registry.bullets, renderBullet),
        '  </hh:refList>',
        ...renderList('styles', registry.styles, renderStyle, '  '),
        '</hh:head>',
    ].join('\n');
}
