import { afterEach, describe, expect, it, vi } from 'vitest';
import { documentWarnings, elixSortKey, processOrdinances, sortByElix, UNKNOWN_ELIX_RANK } from './batch.js';
import type { UploadedOrdinance } from './types.js';

// PDFs are stood in for by their text; "BROKEN" cannot be decoded
async function fakeExtract(data: Buffer): Promise<string> {
  const text = data.toString('utf8');
  if (text === 'BROKEN') throw new Error('Invalid PDF structure');
  return text;
}

function upload(filename: string, text: string): UploadedOrdinance {
  return { filename, data: Buffer.from(text, 'utf8') };
}

const TEXT = [
  'OGGETTO: chiusura via Roma dal 29/12/2025 per la durata presunta di 2 gg',
  'IL RESPONSABILE DEL SETTORE STRADE',
  'Vista la richiesta P.G. n. 321/2025',
].join('\n');

describe('elixSortKey', () => {
  it('ranks unknown numbers last', () => {
    expect(elixSortKey('007')).toBe(7);
    expect(elixSortKey('ELIX')).toBe(UNKNOWN_ELIX_RANK);
    expect(elixSortKey('')).toBe(UNKNOWN_ELIX_RANK);
  });
});

describe('sortByElix', () => {
  it('orders numerically with the sentinel last', () => {
    const entries = ['10', '2', 'ELIX'].map(elixId => ({ record: { elixId } }));
    expect(sortByElix(entries).map(e => e.record.elixId)).toEqual(['2', '10', 'ELIX']);
  });

  it('puts the sentinel after numbers of seven digits or more', () => {
    const entries = ['ELIX', '1000000', '99999999'].map(elixId => ({ record: { elixId } }));
    expect(sortByElix(entries).map(e => e.record.elixId)).toEqual(['1000000', '99999999', 'ELIX']);
  });

  it('keeps upload order for ties', () => {
    const entries = [
      { name: 'a', record: { elixId: 'ELIX' } },
      { name: 'b', record: { elixId: '5' } },
      { name: 'c', record: { elixId: 'ELIX' } },
    ];
    expect(sortByElix(entries).map(e => e.name)).toEqual(['b', 'a', 'c']);
  });
});

describe('documentWarnings', () => {
  it('reports a missing Elix number and a missing P.G. number', () => {
    expect(documentWarnings('scan.pdf', { elixId: 'ELIX', protocolNumber: '' })).toEqual([
      'ELIX non ricavato dal nome file: scan.pdf',
      'Numero P.G. non trovato: scan.pdf',
    ]);
    expect(documentWarnings('ORD_4.pdf', { elixId: '4', protocolNumber: '99' })).toEqual([]);
  });
});

describe('processOrdinances', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sorts extracted documents by Elix number', async () => {
    const result = await processOrdinances(
      [upload('ORD_10.pdf', TEXT), upload('ORD_2.pdf', TEXT), upload('senza_numero.pdf', TEXT)],
      { extractText: fakeExtract }
    );

    expect(result.documents.map(d => d.filename)).toEqual(['ORD_2.pdf', 'ORD_10.pdf', 'senza_numero.pdf']);
    expect(result.documents.map(d => d.record.elixId)).toEqual(['2', '10', 'ELIX']);
    expect(result.documents[0].record.protocolNumber).toBe('321');
    expect(result.warnings).toEqual(['ELIX non ricavato dal nome file: senza_numero.pdf']);
  });

  it('keeps upload order when sorting is off', async () => {
    const result = await processOrdinances([upload('ORD_10.pdf', TEXT), upload('ORD_2.pdf', TEXT)], {
      extractText: fakeExtract,
      orderByElix: false,
    });
    expect(result.documents.map(d => d.record.elixId)).toEqual(['10', '2']);
  });

  it('isolates a PDF that cannot be read', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = await processOrdinances([upload('ORD_1.pdf', 'BROKEN'), upload('ORD_3.pdf', TEXT)], {
      extractText: fakeExtract,
    });

    expect(result.failures).toEqual([{ status: 'failed', filename: 'ORD_1.pdf', error: 'Invalid PDF structure' }]);
    expect(result.documents.map(d => d.filename)).toEqual(['ORD_3.pdf']);
    expect(result.metrics.documentsReceived).toBe(2);
    expect(result.metrics.documentsExtracted).toBe(1);
    expect(result.metrics.documentsFailed).toBe(1);
  });

  it('warns past the advisory upload limit without refusing', async () => {
    const uploads = [1, 2, 3, 4].map(n => upload(`ORD_${n}.pdf`, TEXT));
    const result = await processOrdinances(uploads, { extractText: fakeExtract });

    expect(result.documents).toHaveLength(4);
    expect(result.warnings).toEqual(['Caricati 4 PDF (consigliati al massimo 3)']);
  });

  it('attaches diagnostics on request', async () => {
    const result = await processOrdinances([upload('ORD_1.pdf', TEXT)], { extractText: fakeExtract, diagnostics: true });

    expect(result.documents[0].diagnostics).toEqual({
      addressFromSubject: 'via Roma',
      addressFromBody: '',
      dateFromSubject: '29/12/2025',
      dateFromBody: '',
      durationFromSubject: '2',
      durationFromBody: ['2'],
    });
  });

  it('has nothing to do without uploads', async () => {
    const result = await processOrdinances([], { extractText: fakeExtract });
    expect(result.documents).toEqual([]);
    expect(result.failures).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.metrics.documentsReceived).toBe(0);
  });

  it('counts verdict mismatches', async () => {
    const mismatched = [TEXT, 'ORDINA', 'dal 30/12/2025 in via Roma'].join('\n');
    const result = await processOrdinances([upload('ORD_1.pdf', mismatched)], { extractText: fakeExtract });
    expect(result.metrics.startDateMismatches).toBe(1);
    expect(result.metrics.addressMismatches).toBe(0);
  });
});
