import path from 'path';
import { describe, expect, it } from 'vitest';

import { parseOverrideText } from '../compiler/overrideParser';
import { entriesOfKind } from '../models/Override';
import { LoadError } from '../utils/errors';

const FILE = '/overrides/override.toml';

function loadErrorOf(text: string): LoadError {
  try {
    parseOverrideText(text, FILE);
  } catch (err) {
    if (err instanceof LoadError) return err;
    throw err;
  }
  throw new Error('expected a LoadError');
}

describe('parseOverrideText', () => {
  it('turns tables into tagged entries with defaults applied', () => {
    const file = parseOverrideText(
      `
[[collection]]
name = "English"
group = "english"
printing = [{ spec = "core", name = "Core Set" }]
insert = [{ id = "rules", title = "Rules Card", insert_groups = ["starter"] }]

[[card]]
id = 33001
title = "Test Runner"
printing_id = 99001

[[card]]
id = "flip"
title = "Front"
printings = [{ id = 26066, name = "Promo" }]
faces = ["Back Side"]

[[nrdb_remap]]
from = 32003
to = 33022

[[local_image]]
id = 99001
path = "art/99001.png"

[local_image_root]
url = "https://img.test/local"
`,
      FILE
    );

    expect(entriesOfKind(file, 'collection')).toEqual([
      {
        kind: 'collection',
        group: 'english',
        name: 'English',
        sets: [{ spec: 'core', name: 'Core Set' }],
        inserts: [{ id: 'rules', title: 'Rules Card', insertGroups: ['starter'] }],
      },
    ]);
    expect(entriesOfKind(file, 'card')).toEqual([
      {
        kind: 'card',
        id: '33001',
        group: 'english',
        title: 'Test Runner',
        printings: [{ code: 99001 }],
      },
      {
        kind: 'card',
        id: 'flip',
        group: 'english',
        title: 'Front',
        printings: [{ code: 26066, name: 'Promo' }],
        shape: { kind: 'faces', faces: [{ title: 'Back Side', strippedTitle: 'Back Side' }] },
      },
    ]);
    expect(entriesOfKind(file, 'remap')).toEqual([{ kind: 'remap', from: 32003, to: 33022, supersede: false }]);
    expect(entriesOfKind(file, 'local-image')).toEqual([
      { kind: 'local-image', id: 99001, group: 'english', path: 'art/99001.png', baseDir: path.resolve('/overrides') },
    ]);
    expect(entriesOfKind(file, 'local-image-root')).toEqual([
      { kind: 'local-image-root', url: 'https://img.test/local', extension: 'webp', baseDir: path.resolve('/overrides') },
    ]);
  });

  it('rejects a card with both faces and variants', () => {
    const err = loadErrorOf(`
[[card]]
id = "x"
title = "X"
printing_id = 1
faces = ["Back"]
variants = 2
`);
    expect(err.ids).toEqual(['x']);
    expect(err.message).toContain('cannot define both `faces` and `variants`');
  });

  it('rejects variants below two', () => {
    const err = loadErrorOf(`
[[card]]
id = "x"
title = "X"
printing_id = 1
variants = 1
`);
    expect(err.ids).toEqual(['x']);
    expect(err.message).toContain('`variants` < 2');
  });

  it('rejects printing_id together with printings', () => {
    const err = loadErrorOf(`
[[card]]
id = "x"
title = "X"
printing_id = 1
printings = [{ id = 2 }]
`);
    expect(err.message).toContain('cannot define both `printing_id` and `printings`');
  });

  it('rejects unknown keys', () => {
    const err = loadErrorOf(`
[[card]]
id = "x"
title = "X"
printing_id = 1
colour = "red"
`);
    expect(err.ids).toEqual(['x']);
  });

  it('rejects a local image with both url and path', () => {
    const err = loadErrorOf(`
[[local_image]]
id = 7
url = "https://img.test/7.png"
path = "7.png"
`);
    expect(err.ids).toEqual(['7']);
  });

  it('rejects unknown top-level tables', () => {
    const err = loadErrorOf(`
[[cards]]
id = "x"
`);
    expect(err.ids).toEqual([FILE]);
  });

  it('rejects text that is not TOML', () => {
    const err = loadErrorOf('[[card]\nid = ');
    expect(err.ids).toEqual([FILE]);
  });
});
