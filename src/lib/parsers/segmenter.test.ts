import { describe, expect, it } from 'vitest';
import { filterNoise, PAGE_MARKER, segmentByMarkers } from './segmenter';

const markers = { opening: /OPENING BALANCE/i, closing: /CLOSING BALANCE/i, noise: [PAGE_MARKER] };

describe('segmentByMarkers', () => {
  it('keeps only lines strictly inside the marker window', () => {
    const lines = [
      'Statement period 01-10-2024 to 31-10-2024 100.00 200.00',
      'OPENING BALANCE 2,000.00',
      '31-10-2024 GROCERY STORE 500.00 1500.00 1234',
      'CLOSING BALANCE 1,500.00',
      '01-11-2024 AFTER CLOSE 10.00 1490.00',
    ];

    expect(segmentByMarkers(lines, markers)).toEqual(['31-10-2024 GROCERY STORE 500.00 1500.00 1234']);
  });

  it('reads every window when markers repeat per page', () => {
    const lines = [
      'OPENING BALANCE',
      '01-10-2024 FIRST 10.00 990.00',
      'Page 1 of 2',
      'CLOSING BALANCE',
      'Customer care 1800 000 000',
      'OPENING BALANCE',
      '',
      '   02-10-2024 SECOND 20.00 970.00   ',
      'CLOSING BALANCE',
    ];

    expect(segmentByMarkers(lines, markers)).toEqual([
      '01-10-2024 FIRST 10.00 990.00',
      '02-10-2024 SECOND 20.00 970.00',
    ]);
  });

  it('runs an unclosed window to the end of the document', () => {
    expect(segmentByMarkers(['OPENING BALANCE', '03-10-2024 LAST 5.00 965.00'], markers)).toEqual([
      '03-10-2024 LAST 5.00 965.00',
    ]);
  });

  it('returns nothing when no opening marker is present', () => {
    expect(segmentByMarkers(['03-10-2024 LOOSE 5.00 965.00'], markers)).toEqual([]);
  });
});

describe('filterNoise', () => {
  it('drops blank lines and noise patterns', () => {
    const lines = ['', 'Transaction Details', "12 Oct '24 SWIGGY ₹ 10.00 Debit", '  ', 'Page 2 of 3'];
    expect(filterNoise(lines, [/Transaction Details/i, PAGE_MARKER])).toEqual(["12 Oct '24 SWIGGY ₹ 10.00 Debit"]);
  });
});
