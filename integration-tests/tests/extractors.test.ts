/**
 * Field Extractor Tests
 *
 * Label variants and layouts each strategy must handle, plus registry
 * replacement and reset.
 */

import {
  LabeledLineExtractor,
  attachmentsExtractor,
  claimTypeExtractor,
  effectiveEndExtractor,
  effectiveStartExtractor,
  clearFieldRegistry,
  extractClaim,
  fieldValue,
  getFieldExtractor,
  getFieldExtractorOrThrow,
  getRegisteredFieldPaths,
  getRegistryStats,
  estimatedDamageExtractor,
  incidentDateExtractor,
  incidentDescriptionExtractor,
  incidentLocationExtractor,
  incidentTimeExtractor,
  parsePolicyNumber,
  policyNumberExtractor,
  registerFieldExtractor,
  resetFieldExtractors,
  thirdPartiesExtractor,
} from '@claim-triage/core';

describe('labeled line extraction', () => {
  it('should accept policy number label variants', () => {
    expect(fieldValue(policyNumberExtractor.extract('Policy Number: POL-1'))).toBe('POL-1');
    expect(fieldValue(policyNumberExtractor.extract('policy no. abc123'))).toBe('ABC123');
    expect(fieldValue(policyNumberExtractor.extract('Policy #: 778-XYZ'))).toBe('778-XYZ');
  });

  it('should tolerate bullets, padding and "=" separators', () => {
    expect(fieldValue(policyNumberExtractor.extract('  - Policy Number   =   POL-9'))).toBe('POL-9');
  });

  it('should accept a single space before identifiers, dates and amounts', () => {
    const text = [
      'Policy Number POL-2024-001234',
      'Incident Date 2024-11-15',
      'Estimated Damage $4,500',
    ].join('\n');

    expect(fieldValue(policyNumberExtractor.extract(text))).toBe('POL-2024-001234');
    expect(fieldValue(incidentDateExtractor.extract(text))).toBe('2024-11-15');
    expect(fieldValue(estimatedDamageExtractor.extract(text))).toBe(4500);
    expect(fieldValue(incidentDateExtractor.extract('Date of Loss November 2, 2024'))).toBe('2024-11-02');
  });

  it('should not read ordinary words after a single space as a value', () => {
    expect(incidentLocationExtractor.extract('Location details to follow')).toEqual({ status: 'absent' });
  });

  it('should read both values of a two-column line', () => {
    const text = 'Policy Number: POL-77    Claim Type: auto';

    expect(fieldValue(policyNumberExtractor.extract(text))).toBe('POL-77');
    expect(fieldValue(claimTypeExtractor.extract(text))).toBe('auto');
  });

  it('should use the first occurrence that parses', () => {
    const text = 'Policy Number: N/A\nPolicy No. POL-55';

    expect(fieldValue(policyNumberExtractor.extract(text))).toBe('POL-55');
  });

  it('should be absent when the label has no value', () => {
    const result = policyNumberExtractor.extract('Policy Number:\nPolicyholder Name: John Doe');

    expect(result).toEqual({ status: 'absent' });
  });

  it('should not match a label inside a sentence', () => {
    const result = policyNumberExtractor.extract('The policy number was not given.');

    expect(result.status).toBe('absent');
  });

  it('should normalize CRLF line endings and non-breaking spaces', () => {
    const text = 'Claim Type:\u00a0Injury\r\nTime of Loss: 4:15 pm\r\n';

    expect(fieldValue(claimTypeExtractor.extract(text))).toBe('injury');
    expect(fieldValue(incidentTimeExtractor.extract(text))).toBe('16:15');
  });

  it('should keep an unrecognized claim type as unknown', () => {
    expect(claimTypeExtractor.extract('Claim Type: Marine')).toEqual({
      status: 'present',
      value: 'unknown',
    });
  });
});

describe('date range extraction', () => {
  it('should split a labeled range into start and end', () => {
    const text = 'Effective Dates: 2024-01-01 to 2024-12-31';

    expect(fieldValue(effectiveStartExtractor.extract(text))).toBe('2024-01-01');
    expect(fieldValue(effectiveEndExtractor.extract(text))).toBe('2024-12-31');
  });

  it('should read written dates separated by a dash', () => {
    const text = 'Policy Period: March 1, 2024 - February 28, 2025';

    expect(fieldValue(effectiveStartExtractor.extract(text))).toBe('2024-03-01');
    expect(fieldValue(effectiveEndExtractor.extract(text))).toBe('2025-02-28');
  });

  it('should fall back to dedicated start and end labels', () => {
    const text = 'Effective Date: 01/01/2024\nExpiration Date: 12/31/2024';

    expect(fieldValue(effectiveStartExtractor.extract(text))).toBe('2024-01-01');
    expect(fieldValue(effectiveEndExtractor.extract(text))).toBe('2024-12-31');
  });
});

describe('labeled block extraction', () => {
  it('should join continuation lines up to the next label', () => {
    const text = [
      'Description: Car hit a pole.',
      'Driver was uninjured.',
      'Claimant: John Doe',
    ].join('\n');

    expect(fieldValue(incidentDescriptionExtractor.extract(text))).toBe(
      'Car hit a pole. Driver was uninjured.'
    );
  });

  it('should keep a continuation line that mentions a clock time', () => {
    const text = [
      'Description: Rear-ended at a stop light.',
      'The other driver admitted at 5:30 pm the crash was staged.',
      'Claim Type: auto',
    ].join('\n');

    expect(fieldValue(incidentDescriptionExtractor.extract(text))).toBe(
      'Rear-ended at a stop light. The other driver admitted at 5:30 pm the crash was staged.'
    );
  });

  it('should stop at a section heading', () => {
    const text = ['Description: Car hit a pole.', 'ASSET DETAILS', 'Asset Type: Vehicle'].join('\n');

    expect(fieldValue(incidentDescriptionExtractor.extract(text))).toBe('Car hit a pole.');
  });

  it('should read a value that starts on the line after the label', () => {
    const text = ['Description of Loss:', '', 'Tree fell on the garage roof.', '', 'Claimant: Ann Park'].join('\n');

    expect(fieldValue(incidentDescriptionExtractor.extract(text))).toBe('Tree fell on the garage roof.');
  });
});

describe('labeled list extraction', () => {
  it('should read bulleted items under the label', () => {
    const text = ['Third Parties:', '- Jane Smith', '- Tom Lee', 'Claim Type: auto'].join('\n');

    expect(fieldValue(thirdPartiesExtractor.extract(text))).toEqual(['Jane Smith', 'Tom Lee']);
  });

  it('should read an inline list', () => {
    const text = 'Attachments: photo1.jpg, estimate.pdf';

    expect(fieldValue(attachmentsExtractor.extract(text))).toEqual(['photo1.jpg', 'estimate.pdf']);
  });

  it('should distinguish an empty list from a missing label', () => {
    expect(thirdPartiesExtractor.extract('Third Parties: None')).toEqual({
      status: 'present',
      value: [],
    });
    expect(thirdPartiesExtractor.extract('Claimant: John Doe')).toEqual({ status: 'absent' });
  });
});

describe('extractor registry', () => {
  afterEach(() => {
    resetFieldExtractors();
  });

  it('should register one extractor per field path', () => {
    const stats = getRegistryStats();

    expect(stats.totalExtractors).toBe(18);
    expect(stats.byStrategy).toEqual({
      labeled_line: 13,
      labeled_block: 1,
      labeled_list: 2,
      date_range: 2,
    });
  });

  it('should replace the extractor for a path without touching the others', () => {
    registerFieldExtractor(
      new LabeledLineExtractor({
        fieldPath: 'policyInformation.policyNumber',
        description: 'Contract reference used by a partner carrier',
        labels: ['Contract Ref'],
        parse: parsePolicyNumber,
      })
    );

    const record = extractClaim('Contract Ref: CR-2040\nClaim Type: property');

    expect(fieldValue(record.policyInformation.policyNumber)).toBe('CR-2040');
    expect(fieldValue(record.otherMandatoryFields.claimType)).toBe('property');
    expect(getRegistryStats().totalExtractors).toBe(18);
  });

  it('should list registered paths in registration order', () => {
    const paths = getRegisteredFieldPaths();

    expect(paths).toHaveLength(18);
    expect(paths[0]).toBe('policyInformation.policyNumber');
    expect(paths).toContain('otherMandatoryFields.initialEstimate');
  });

  it('should throw for a path with no extractor', () => {
    clearFieldRegistry();

    expect(() => getFieldExtractorOrThrow('incidentInformation.location')).toThrow(
      'No extractor registered for field: incidentInformation.location'
    );
  });

  it('should restore built-in extractors on reset', () => {
    registerFieldExtractor(
      new LabeledLineExtractor({
        fieldPath: 'policyInformation.policyNumber',
        description: 'Contract reference',
        labels: ['Contract Ref'],
        parse: parsePolicyNumber,
      })
    );

    resetFieldExtractors();

    expect(getFieldExtractor('policyInformation.policyNumber')).toBe(policyNumberExtractor);
  });
});
