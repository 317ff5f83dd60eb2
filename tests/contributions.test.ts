import { describe, it, expect } from 'vitest';
import { blankColumn, collectContributions, type Submission } from '../src/contributions';
import { exportMaster, exportSingle } from '../src/exporters';
import { buildMasterLayout, buildSheetLayout } from '../src/layout';
import { Piece } from '../src/piece';
import type { SheetExport } from '../src/types';
import { column, loadTemplate } from './helpers/fixtures';

const template = loadTemplate();

const piece = new Piece(
  {
    title: 'Mass',
    sources: [
      { name: 'S1', link: 'L1' },
      { name: 'S2', link: 'L2' },
    ],
  },
  template
);

function sheet(sources: SheetExport['sources'], notes: Partial<SheetExport['notes']> = {}): SheetExport {
  return {
    title: 'Mass',
    barCount: 4,
    sources,
    notes: {
      fields: { instrument: '', reviewed: '', ...notes.fields },
      bars: { '1': '', '2': '', '3': '', '4': '', ...notes.bars },
    },
  };
}

describe('blankColumn', () => {
  it('should hold every field and bar', () => {
    expect(blankColumn(template, 2)).toEqual({
      fields: { instrument: '', reviewed: '' },
      bars: { '1': '', '2': '' },
      comments: '',
    });
  });
});

describe('collectContributions', () => {
  const submissions: Submission[] = [
    {
      email: 'a@example.com',
      sheet: sheet([{ name: 'S1', link: 'L1', ...column('a') }], {
        fields: { instrument: 'check tuning' },
        bars: { '2': 'rushed' },
      }),
    },
    {
      email: 'b@example.com',
      sheet: sheet([
        { name: 'S9', link: 'L9', ...column('x') },
        { name: 'S2', link: 'L2', ...column('b') },
      ]),
    },
  ];

  it('should file each submitted column under its source and email', () => {
    const data = collectContributions(piece, submissions);

    expect(Object.keys(data.sources)).toEqual(['S1', 'S2']);
    expect(data.sources.S1.volunteers).toEqual({ 'a@example.com': column('a') });
    expect(data.sources.S2.volunteers).toEqual({ 'b@example.com': column('b') });
    expect(data.sources.S1.summary).toEqual(blankColumn(template, 4));
  });

  it('should gather non-empty notes by email', () => {
    const data = collectContributions(piece, submissions);

    expect(data.notes).toEqual({
      fields: { instrument: { 'a@example.com': 'check tuning' }, reviewed: {} },
      bars: { '1': {}, '2': { 'a@example.com': 'rushed' }, '3': {}, '4': {} },
    });
  });

  it('should fill cells missing from a submission with empty strings', () => {
    const short = { fields: { instrument: 'Piano' }, bars: { '1': 'p' }, comments: 'short' };
    const data = collectContributions(piece, [
      { email: 'c@example.com', sheet: sheet([{ name: 'S1', link: 'L1', ...short }]) },
    ]);

    expect(data.sources.S1.volunteers['c@example.com']).toEqual({
      fields: { instrument: 'Piano', reviewed: '' },
      bars: { '1': 'p', '2': '', '3': '', '4': '' },
      comments: 'short',
    });
  });

  it('should feed a master sheet built from volunteer exports', () => {
    const single = buildSheetLayout(piece).values;
    // volunteer fills in S1's first bar and a note
    single[4][1] = 'forte';
    single[4][3] = 'missing slur';
    const exported = exportSingle(single, template);
    if (!exported.ok) throw new Error(exported.error.message);

    const contributions = collectContributions(piece, [
      { email: 'a@example.com', sheet: exported.data },
    ]);
    const master = exportMaster(buildMasterLayout(piece, contributions).values, template);
    if (!master.ok) throw new Error(master.error.message);

    expect(master.data.sources[0].volunteers['a@example.com'].bars['1']).toBe('forte');
    expect(master.data.sources[1].volunteers['a@example.com'].bars['1']).toBe('');
    expect(master.data.notes.bars['1']).toEqual({ 'a@example.com': 'missing slur' });
  });
});

describe('notes through a master sheet', () => {
  it('should keep every line of a multi-line note', () => {
    const submissions: Submission[] = [
      { email: 'a@example.com', sheet: sheet([], { bars: { '2': 'line one\nline two' } }) },
      { email: 'b@example.com', sheet: sheet([], { bars: { '2': 'first\nsecond' } }) },
    ];
    const contributions = collectContributions(piece, submissions);
    const result = exportMaster(buildMasterLayout(piece, contributions).values, template);
    if (!result.ok) throw new Error(result.error.message);

    expect(result.data.notes.bars['2']).toEqual({
      'a@example.com': 'line one\nline two',
      'b@example.com': 'first\nsecond',
    });
    expect(result.data.notes.bars['1']).toEqual({});
  });

  it('should keep a volunteer whose email is __proto__', () => {
    const submissions: Submission[] = [
      {
        email: '__proto__',
        sheet: sheet([{ name: 'S1', link: 'L1', ...column('p') }], { bars: { '1': 'odd' } }),
      },
    ];
    const contributions = collectContributions(piece, submissions);
    expect(Object.keys(contributions.sources.S1.volunteers)).toEqual(['__proto__']);

    const result = exportMaster(buildMasterLayout(piece, contributions).values, template);
    if (!result.ok) throw new Error(result.error.message);

    expect(Object.keys(result.data.sources[0].volunteers)).toEqual(['__proto__']);
    expect(Object.keys(result.data.notes.bars['1'])).toEqual(['__proto__']);
  });
});
