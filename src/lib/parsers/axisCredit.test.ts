import { describe, expect, it } from 'vitest';
import { axisCreditFormat } from './axisCredit';

describe('AxisCreditFormat', () => {
  it('reads a debit line with a rupee sign', () => {
    const outcome = axisCreditFormat.extract("12 Oct '24 SWIGGY   BANGALORE ₹ 1,234.50 Debit");

    expect(outcome).toEqual({
      kind: 'matched',
      transaction: {
        date: new Date(Date.UTC(2024, 9, 12)),
        description: 'SWIGGY BANGALORE',
        amountCents: 123450,
        direction: 'Debit',
        rawText: "12 Oct '24 SWIGGY   BANGALORE ₹ 1,234.50 Debit",
      },
    });
  });

  it('reads credits and ignores text after the marker', () => {
    const credit = axisCreditFormat.extract("15 Oct '24 PAYMENT RECEIVED 5,000.00 Credit");
    expect(credit.kind === 'matched' && credit.transaction.direction).toBe('Credit');
    expect(credit.kind === 'matched' && credit.transaction.amountCents).toBe(500000);

    const withPoints = axisCreditFormat.extract("16 Oct '24 AMAZON Rs. 99.00 Debit  Reward points 10");
    expect(withPoints.kind === 'matched' && withPoints.transaction.description).toBe('AMAZON');
    expect(withPoints.kind === 'matched' && withPoints.transaction.amountCents).toBe(9900);
  });

  it('reports dated lines it cannot read', () => {
    expect(axisCreditFormat.extract("17 Oct '24 BROKEN LINE")).toEqual({
      kind: 'malformed',
      reason: 'missing amount or Debit/Credit marker',
    });
    expect(axisCreditFormat.extract("18 Oct '24 REFUND -20.00 Credit")).toEqual({
      kind: 'malformed',
      reason: 'invalid amount "-20.00"',
    });
    expect(axisCreditFormat.extract("31 Feb '24 NOWHERE 1.00 Debit")).toEqual({
      kind: 'malformed',
      reason: `invalid date "31 Feb '24"`,
    });
  });

  it('skips lines without a leading date', () => {
    expect(axisCreditFormat.extract('Total Amount Due 5,000.00')).toEqual({ kind: 'no_match' });
  });

  it('drops headers and page furniture when segmenting', () => {
    const lines = [
      'Credit Card Number XXXX XXXX XXXX 0000',
      'Transaction Details',
      'Date Transaction Details Amount',
      "12 Oct '24 SWIGGY ₹ 10.00 Debit",
      'Page 1 of 3',
      '',
      'End of Transaction Details',
    ];
    expect(axisCreditFormat.segment(lines)).toEqual(["12 Oct '24 SWIGGY ₹ 10.00 Debit"]);
  });

  it('scores documents by card markers', () => {
    expect(axisCreditFormat.canParse('Axis Bank Credit Card Statement', 'statement.pdf')).toBe(0.9);
    expect(axisCreditFormat.canParse('', 'axis_credit_oct.pdf')).toBe(0.8);
    expect(axisCreditFormat.canParse('AXIS BANK', 'statement.pdf')).toBe(0.55);
    expect(axisCreditFormat.canParse('HDFC Bank', 'hdfc.pdf')).toBe(0);
  });
});
