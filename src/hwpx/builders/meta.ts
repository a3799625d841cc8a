/**
 * Package metadata payloads: version, settings, container, manifest,
 * RDF, content.hpf and the preview text.
 */

import { HWPX_PATHS, NAMESPACES, PREVIEW_TEXT_LIMIT } from '../constants.js';
import type { BinaryItem } from '../types.js';
import { escapeXmlAttr } from '../utils/escaping.js';

const XML_DECL = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

export function renderVersionXml(): string {
    return (
        `${XML_DECL}\n` +
        `<hv:HCFVersion xmlns:hv="${NAMESPACES.HV}" tagetApplication="WORDPROCESSOR" major="5" minor="1" micro="1"` +
        ' buildNumber="0" os="1" xmlVersion="1.5" application="Hancom Office Hangul" appVersion="12.0.0.1"/>\n'
    );
}

const PRINT_INFO: readonly [string, string, string][] = [
    ['PrintAutoFootNote', 'boolean', 'false'],
    ['PrintAutoHeadNote', 'boolean', 'false'],
    ['PrintCropMark', 'short', '0'],
    ['BinderHoleType', 'short', '0'],
    ['ZoomX', 'short', '100'],
    ['ZoomY', 'short', '100'],
];

export function renderSettingsXml(): string {
    return [
        XML_DECL,
        `<ha:HWPApplicationSetting xmlns:ha="${NAMESPACES.HA}" xmlns:config="urn:oasis:names:tc:opendocument:xmlns:config:1.0">`,
        '  <ha:CaretPosition listIDRef="0" paraIDRef="0" pos="0"/>',
        '  <config:config-item-set name="PrintInfo">',
        ...PRINT_INFO.map(
            ([name, type, value]) => `    <config:config-item name="${name}" type="${type}">${value}</config:config-item>`,
        ),
        '  </config:config-item-set>',
        '</ha:HWPApplicationSetting>',
        '',
    ].join('\n');
}

export function renderContainerXml(): string {
    return [
        XML_DECL,
        `<ocf:container xmlns:ocf="${NAMESPACES.OCF}" xmlns:hpf="${NAMESPACES.HPF}">`,
        '  <ocf:rootfiles>',
        `    <ocf:rootfile full-path="${HWPX_PATHS.CONTENT_HPF}" media-type="application/hwpml-package+xml"/>`,
        `    <ocf:rootfile full-path="${HWPX_PATHS.PREVIEW_TEXT}" media-type="text/plain"/>`,
        `    <ocf:rootfile full-path="${HWPX_PATHS.CONTAINER_RDF}" media-type="application/rdf+xml"/>`,
        '  </ocf:rootfiles>',
        '</ocf:container>',
        '',
    ].join('\n');
}

export function renderManifestXml(): string {
    return `${XML_DECL}\n<odf:manifest xmlns:odf="${NAMESPACES.ODF}"/>\n`;
}

function rdfPart(path: string, type: string): string[] {
    return [
        '  <rdf:Description rdf:about="">',
        `    <ns0:hasPart xmlns:ns0="${NAMESPACES.PKG}" rdf:resource="${path}"/>`,
        '  </rdf:Description>',
        `  <rdf:Description rdf:about="${path}">`,
        `    <rdf:type rdf:resource="${NAMESPACES.PKG}${type}"/>`,
        '  </rdf:Description>',
    ];
}

export function renderContainerRdf(): string {
    return [
        XML_DECL,
        `<rdf:RDF xmlns:rdf="${NAMESPACES.RDF}">`,
        ...rdfPart(HWPX_PATHS.HEADER, 'HeaderFile'),
        ...rdfPart(HWPX_PATHS.SECTION, 'SectionFile'),
        '  <rdf:Description rdf:about="">',
        `    <rdf:type rdf:resource="${NAMESPACES.PKG}Document"/>`,
        '  </rdf:Description>',
        '</rdf:RDF>',
        '',
    ].join('\n');
}

/** Package manifest; every embedded binary gets an `opf:item`. */
export function renderContentHpf(binaryItems: readonly BinaryItem[] = []): string {
    const binaries = binaryItems.map(
        (item) =>
            `    <opf:item id="${escapeXmlAttr(item.id)}" href="${escapeXmlAttr(item.href)}"` +
            ` media-type="${escapeXmlAttr(item.mediaType)}" isEmbeded="1"/>`,
    );
    return [
        '<?xml version="1.0" encoding="utf-8"?>',
        `<opf:package xmlns:opf="${NAMESPACES.OPF}" version="" unique-identifier="" id="">`,
        '  <opf:metadata>',
        '    <opf:title></opf:title>',
        '    <opf:language>ko</opf:language>',
        '    <opf:meta name="creator" content="text"></opf:meta>',
        '    <opf:meta name="subject" content="text"/>',
        '    <opf:meta name="description" content="text"/>',
        '    <opf:meta name="keyword" content="text"/>',
        '  </opf:metadata>',
        '  <opf:manifest>',
        `    <opf:item id="header" href="${HWPX_PATHS.HEADER}" media-type="application/xml"/>`,
        `    <opf:item id="section0" href="${HWPX_PATHS.SECTION}" media-type="application/xml"/>`,
        `    <opf:item id="settings" href="${HWPX_PATHS.SETTINGS}" media-type="application/xml"/>`,
        ...binaries,
        '  </opf:manifest>',
        '  <opf:spine>',
        '    <opf:itemref idref="header" linear="yes"/>',
        '    <opf:itemref idref="section0" linear="yes"/>',
        '  </opf:spine>',
        '</opf:package>',
        '',
    ].join('\n');
}

/** Never empty: a blank document previews as a single space. */
export function renderPreviewText(text: string): string {
    return text ? text.slice(0, PREVIEW_TEXT_LIMIT) : ' ';
}
