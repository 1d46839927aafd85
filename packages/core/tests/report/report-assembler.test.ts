import { describe, expect, it } from 'vitest';
import type { ImageEntry } from '../../src/models/image-entry.js';
import { assembleReport, serializeReport } from '../../src/report/report-assembler.js';

const entry: ImageEntry = {
  file: 'img/a.png',
  rotation: 0,
  words: [
    {
      text: 'Größe',
      rotation: 0,
      position: { left: 1, top: 2, right: 5, bottom: 8, center_x: 3, center_y: 5 },
      font_size: 6,
      confidence: 88.5,
    },
  ],
};

describe('assembleReport', () => {
  it('wraps the entries under images in order', () => {
    const second: ImageEntry = { file: 'img/b.png', rotation: 90, words: [] };

    const report = assembleReport([entry, second]);

    expect(report.images.map((image) => image.file)).toEqual(['img/a.png', 'img/b.png']);
  });

  it('produces an empty images array when nothing was processed', () => {
    expect(assembleReport([])).toEqual({ images: [] });
  });
});

describe('serializeReport', () => {
  it('writes indented JSON with snake_case keys and a trailing newline', () => {
    const json = serializeReport({ images: [{ file: 'img/b.png', rotation: 180, words: [] }] });

    expect(json).toBe(
      [
        '{',
        '  "images": [',
        '    {',
        '      "file": "img/b.png",',
        '      "rotation": 180,',
        '      "words": []',
        '    }',
        '  ]',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('keeps non-ASCII text unescaped', () => {
    const json = serializeReport(assembleReport([entry]));

    expect(json).toContain('"text": "Größe"');
    expect(JSON.parse(json)).toEqual({ images: [entry] });
  });
});
