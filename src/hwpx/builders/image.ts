/**
 * Inline picture rendering. The picture sits in its own paragraph and is
 * treated as a character so it flows with the text.
 */

import type { ImageBlock } from '../types.js';
import { escapeXml } from '../utils/escaping.js';
import { openParagraph } from './paragraph.js';

const IDENTITY = 'e1="1" e2="0" e3="0" e4="0" e5="1" e6="0"';

export function renderPicture(image: ImageBlock): string {
    const { width, height, originalWidth, originalHeight } = image;
    const lines = [
        `<hp:pic id="${image.picId}" zOrder="0" numberingType="PICTURE" textWrap="TOP_AND_BOTTOM" textFlow="BOTH_SIDES"` +
            ` lock="0" dropcapstyle="None" href="" groupLevel="0" instid="${image.instId}" reverse="0">`,
        '<hp:offset x="0" y="0"/>',
        `<hp:orgSz width="${originalWidth}" height="${originalHeight}"/>`,
        `<hp:curSz width="${width}" height="${height}"/>`,
        '<hp:flip horizontal="0" vertical="0"/>',
        `<hp:rotationInfo angle="0" centerX="${Math.round(width / 2)}" centerY="${Math.round(height / 2)}" rotateimage="1"/>`,
        '<hp:renderingInfo>',
        `<hc:transMatrix ${IDENTITY}/>`,
        `<hc:scaMatrix ${IDENTITY}/>`,
        `<hc:rotMatrix ${IDENTITY}/>`,
        '</hp:renderingInfo>',
        `<hc:img binaryItemIDRef="${image.itemId}" bright="0" contrast="0" effect="REAL_PIC" alpha="0"/>`,
        '<hp:imgRect>',
        '<hc:pt0 x="0" y="0"/>',
        `<hc:pt1 x="${originalWidth}" y="0"/>`,
        `<hc:pt2 x="${originalWidth}" y="${originalHeight}"/>`,
        `<hc:pt3 x="0" y="${originalHeight}"/>`,
        '</hp:imgRect>',
        `<hp:imgClip left="0" right="${originalWidth}" top="0" bottom="${originalHeight}"/>`,
        '<hp:inMargin left="0" right="0" top="0" bottom="0"/>',
        `<hp:imgDim dimwidth="${originalWidth}" dimheight="${originalHeight}"/>`,
        '<hp:effects/>',
        `<hp:sz width="${width}" widthRelTo="ABSOLUTE" height="${height}" heightRelTo="ABSOLUTE" protect="0"/>`,
        '<hp:pos treatAsChar="1" affectLSpacing="0" flowWithText="1" allowOverlap="0" holdAnchorAndSO="0"' +
            ' vertRelTo="PARA" horzRelTo="COLUMN" vertAlign="TOP" horzAlign="LEFT" vertOffset="0" horzOffset="0"/>',
        '<hp:outMargin left="0" right="0" top="0" bottom="0"/>',
    ];
    if (image.alt) lines.push(`<hp:shapeComment>${escapeXml(image.alt)}</hp:shapeComment>`);
    lines.push('</hp:pic>');
    return lines.join('');
}

export function renderImage(image: ImageBlock): string {
    return (
        `${openParagraph(image.paraPrId, image.styleId)}<hp:run charPrIDRef="${image.charPrId}">` +
        `${renderPicture(image)}<hp:t/></hp:run></hp:p>`
    );
}
