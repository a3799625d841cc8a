export { renderHeaderXml } from './header.js';
export { renderImage, renderPicture } from './image.js';
export {
    renderContainerRdf,
    renderContainerXml,
    renderContentHpf,
    renderManifestXml,
    renderPreviewText,
    renderSettingsXml,
    renderVersionXml,
} from './meta.js';
export { hyperlinkCommand, renderParagraph, renderRun } from './paragraph.js';
export { renderSecPr, renderSectionXml, type SectionInput } from './section.js';
export { serialize } from './serialize.js';
export { renderTable, renderTableCell } from './table.js';
