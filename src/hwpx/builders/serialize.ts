/**
 * Registry + document model -> the two XML payloads.
 *
 * Pure: the same registry and blocks always give the same bytes. IDs are
 * written as the model holds them; HwpxDocument checks them on insert.
 */

import type { DocumentModel } from '../document.js';
import type { Registry } from '../registry.js';
import type { SerializedPayloads } from '../types.js';
import { renderHeaderXml } from './header.js';
import { renderSectionXml } from './section.js';

export function serialize(registry: Registry, model: DocumentModel): SerializedPayloads {
    return {
        header: renderHeaderXml(registry),
        section: renderSectionXml(model),
    };
}
