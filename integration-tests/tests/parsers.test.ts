/**
 * Value Parser Tests
 *
 * Normalization of captured label values, and degrade-to-null for values
 * that cannot be read as their type.
 */

import {
  parseAmount,
  parseClaimType,
  parseDate,
  parseEmail,
  parseFreeText,
  parsePersonName,
  parsePhone,
  parsePolicyNumber,
  parseTime,
  splitList,
} from '@claim-triage/core';

describe('parseAmount', () => {
  it('should strip currency symbols and thousands separators', () => {
    expect(parseAmount('$15,000')).toBe(15000);
    expect(parseAmount('USD 2,500')).toBe(2500);
    expect(parseAmount('15000.50')).toBe(15000.5);
  });

  it('should ignore trailing text after the amount', () => {
    expect(parseAmount('$12,345.67 (approx)')).toBe(12345.67);
  });

  it('should read thousands groups separated by spaces', () => {
    expect(parseAmount('$30 000')).toBe(30000);
    expect(parseAmount('USD 1 250 000.75')).toBe(1250000.75);
  });

  it('should reject amounts whose magnitude is not fully readable', () => {
    expect(parseAmount('30k')).toBeNull();
    expect(parseAmount('$2 million')).toBeNull();
    expect(parseAmount('30 00')).toBeNull();
    expect(parseAmount('1,50')).toBeNull();
  });

  it('should accept a sentence-ending period after the amount', () => {
    expect(parseAmount('$15,000.')).toBe(15000);
  });

  it('should reject negative amounts instead of using zero', () => {
    expect(parseAmount('-$500')).toBeNull();
    expect(parseAmount('$-500')).toBeNull();
  });

  it('should return null for non-numeric text', () => {
    expect(parseAmount('unknown')).toBeNull();
    expect(parseAmount('')).toBeNull();
  });
});

describe('parseDate', () => {
  it('should keep ISO dates', () => {
    expect(parseDate('2024-11-15')).toBe('2024-11-15');
  });

  it('should normalize US dates', () => {
    expect(parseDate('11/15/2024')).toBe('2024-11-15');
    expect(parseDate('3/5/2024')).toBe('2024-03-05');
  });

  it('should normalize written dates', () => {
    expect(parseDate('November 15, 2024')).toBe('2024-11-15');
    expect(parseDate('Nov. 15 2024')).toBe('2024-11-15');
  });

  it('should reject calendar-invalid dates', () => {
    expect(parseDate('2024-02-30')).toBeNull();
    expect(parseDate('13/45/2024')).toBeNull();
  });

  it('should return null for text that is not a date', () => {
    expect(parseDate('yesterday')).toBeNull();
  });
});

describe('parseTime', () => {
  it('should convert 12-hour times to 24-hour HH:MM', () => {
    expect(parseTime('2:30 PM')).toBe('14:30');
    expect(parseTime('12:05 am')).toBe('00:05');
    expect(parseTime('12:00 PM')).toBe('12:00');
  });

  it('should keep 24-hour times and drop seconds', () => {
    expect(parseTime('09:05')).toBe('09:05');
    expect(parseTime('23:59:10')).toBe('23:59');
  });

  it('should reject out-of-range times', () => {
    expect(parseTime('25:00')).toBeNull();
    expect(parseTime('13:00 PM')).toBeNull();
    expect(parseTime('noon')).toBeNull();
  });
});

describe('parsePolicyNumber', () => {
  it('should take the first identifier token, uppercased', () => {
    expect(parsePolicyNumber('pol-2024-001234')).toBe('POL-2024-001234');
    expect(parsePolicyNumber('POL-2024-001234 (auto)')).toBe('POL-2024-001234');
  });

  it('should reject placeholders and tokens without digits', () => {
    expect(parsePolicyNumber('N/A')).toBeNull();
    expect(parsePolicyNumber('PENDING')).toBeNull();
    expect(parsePolicyNumber('A1')).toBeNull();
  });
});

describe('parsePersonName', () => {
  it('should accept names with accents and apostrophes', () => {
    expect(parsePersonName('John Doe')).toBe('John Doe');
    expect(parsePersonName("Seán O'Brien")).toBe("Seán O'Brien");
  });

  it('should drop a trailing role and punctuation', () => {
    expect(parsePersonName('Jane Roe (driver)')).toBe('Jane Roe');
    expect(parsePersonName('John Doe.')).toBe('John Doe');
  });

  it('should reject placeholders and non-names', () => {
    expect(parsePersonName('N/A')).toBeNull();
    expect(parsePersonName('12345')).toBeNull();
  });
});

describe('contact details', () => {
  it('should find and lowercase an email address', () => {
    expect(parseEmail('Contact: Jane.Roe@Example.com')).toBe('jane.roe@example.com');
    expect(parseEmail('not an email')).toBeNull();
  });

  it('should accept phone numbers with 7 to 15 digits', () => {
    expect(parsePhone('(555) 123-4567')).toBe('(555) 123-4567');
    expect(parsePhone('+1 555 010 2233')).toBe('+1 555 010 2233');
    expect(parsePhone('123')).toBeNull();
  });
});

describe('parseClaimType', () => {
  it('should map known categories and their aliases', () => {
    expect(parseClaimType('auto')).toBe('auto');
    expect(parseClaimType('Automobile')).toBe('auto');
    expect(parseClaimType('Vehicle collision')).toBe('auto');
    expect(parseClaimType('INJURY')).toBe('injury');
    expect(parseClaimType('Property damage')).toBe('property');
  });

  it('should treat bodily and medical claims as injury', () => {
    expect(parseClaimType('Bodily Injury')).toBe('injury');
    expect(parseClaimType('Medical')).toBe('injury');
    expect(parseClaimType('Auto - Personal Injury')).toBe('injury');
    expect(parseClaimType('Personal property')).toBe('property');
  });

  it('should map an unrecognized stated type to unknown', () => {
    expect(parseClaimType('Marine')).toBe('unknown');
  });

  it('should treat placeholders as not provided', () => {
    expect(parseClaimType('N/A')).toBeNull();
    expect(parseClaimType('TBD')).toBeNull();
    expect(parseClaimType('')).toBeNull();
  });
});

describe('free text and lists', () => {
  it('should collapse whitespace in free text', () => {
    expect(parseFreeText('  123   Main St ')).toBe('123 Main St');
  });

  it('should treat placeholder text as absent', () => {
    expect(parseFreeText('N/A')).toBeNull();
    expect(parseFreeText('---')).toBeNull();
    expect(parseFreeText('')).toBeNull();
  });

  it('should split lists on commas, semicolons and "and"', () => {
    expect(splitList('Jane Smith, Tom Lee and Ann Park')).toEqual(['Jane Smith', 'Tom Lee', 'Ann Park']);
    expect(splitList('a.jpg; b.pdf')).toEqual(['a.jpg', 'b.pdf']);
  });

  it('should read "None" as an empty list', () => {
    expect(splitList('None')).toEqual([]);
  });
});
