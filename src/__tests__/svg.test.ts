import { describe, it, expect } from 'vitest';
import { escapeXml, fmt, googleFontImport, renderSvg } from '../render/svg.js';
import { Scene } from '../scene.js';
import { parseGridConfig } from '../config.js';
import { runCardGridPipeline } from '../layout/index.js';
import { recordsFromCounts, TEST_FIELDS } from '../layout/__tests__/helpers/records.js';

const SCENE: Scene = {
    width: 100,
    height: 50,
    fonts: [{ family: 'Open Sans' }],
    root: {
        kind: 'group',
        id: 'page',
        children: [
            { kind: 'rect', x: 0, y: 0, width: 100, height: 50, fill: 'white' },
            {
                kind: 'group',
                translate: { x: 10, y: 5 },
                children: [
                    {
                        kind: 'clipped-image',
                        href: 'a.png',
                        x: 0,
                        y: 0,
                        width: 20,
                        height: 20,
                        clip: { cx: 10, cy: 10, r: 10 }
                    },
                    {
                        kind: 'text',
                        text: 'Scottish National\nParty',
                        x: 5,
                        y: 25,
                        fontSize: 20,
                        fontWeight: 600,
                        fontFamily: 'Open Sans',
                        fontStyle: 'normal',
                        fill: '#333',
                        textAnchor: 'start',
                        dominantBaseline: 'auto'
                    }
                ]
            }
        ]
    }
};

describe('renderSvg', () => {
    it('serializes a scene', () => {
        expect(renderSvg(SCENE)).toBe([
            '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="50" viewBox="0 0 100 50">',
            '  <defs>',
            '    <style>',
            "      @import url('https://fonts.googleapis.com/css2?family=Open+Sans');",
            '    </style>',
            '  </defs>',
            '  <g id="page">',
            '    <rect x="0" y="0" width="100" height="50" fill="white"/>',
            '    <g transform="translate(10,5)">',
            '      <clipPath id="clip-0">',
            '        <circle cx="10" cy="10" r="10"/>',
            '      </clipPath>',
            '      <image href="a.png" x="0" y="0" width="20" height="20" preserveAspectRatio="xMidYMid slice" clip-path="url(#clip-0)"/>',
            '      <text x="5" y="25" font-family="Open Sans" font-size="20" font-weight="600" fill="#333" text-anchor="start">' +
                '<tspan x="5">Scottish National</tspan><tspan x="5" dy="1.2em">Party</tspan></text>',
            '    </g>',
            '  </g>',
            '</svg>'
        ].join('\n'));
    });

    it('takes custom font CSS', () => {
        const svg = renderSvg(SCENE, { fontCss: font => `/* ${font.family} */` });
        expect(svg.split('\n')[3]).toBe('      /* Open Sans */');
    });

    it('escapes text content', () => {
        const scene: Scene = {
            width: 10,
            height: 10,
            fonts: [],
            root: {
                kind: 'group',
                children: [{
                    kind: 'text',
                    text: 'Fish & <Chips>',
                    x: 0,
                    y: 0,
                    fontSize: 8,
                    fontWeight: 400,
                    fontFamily: 'Open Sans',
                    fontStyle: 'italic',
                    fill: 'black',
                    textAnchor: 'middle',
                    dominantBaseline: 'hanging'
                }]
            }
        };

        expect(renderSvg(scene).split('\n')[2]).toBe(
            '    <text x="0" y="0" font-family="Open Sans" font-size="8" font-weight="400" font-style="italic" ' +
            'fill="black" text-anchor="middle" dominant-baseline="hanging">Fish &amp; &lt;Chips&gt;</text>'
        );
    });

    it('numbers clip paths in document order', () => {
        const result = runCardGridPipeline({
            records: recordsFromCounts([['A', 3]]),
            fields: TEST_FIELDS,
            config: parseGridConfig({})
        });
        const ids = [...renderSvg(result.scene).matchAll(/<clipPath id="([^"]+)">/g)].map(m => m[1]);

        expect(ids).toEqual(['clip-0', 'clip-1', 'clip-2']);
    });
});

describe('googleFontImport', () => {
    it('encodes the family name', () => {
        expect(googleFontImport({ family: 'Noto Sans JP' }))
            .toBe("@import url('https://fonts.googleapis.com/css2?family=Noto+Sans+JP');");
    });
});

describe('fmt', () => {
    it.each([
        [40, '40'],
        [2.5, '2.5'],
        [1 / 3, '0.3333'],
        [-0.00001, '0']
    ])('%d → %s', (value, expected) => {
        expect(fmt(value)).toBe(expected);
    });
});

describe('escapeXml', () => {
    it('escapes quotes for attributes', () => {
        expect(escapeXml(`a"b'c&`)).toBe('a&quot;b&apos;c&amp;');
    });
});
