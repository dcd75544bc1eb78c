/**
 * Incident Information Extractors
 */

import { LabeledBlockExtractor, LabeledLineExtractor } from '../base-extractor';
import { parseDate, parseFreeText, parseTime } from '../parsers';

export const incidentDateExtractor = new LabeledLineExtractor({
  fieldPath: 'incidentInformation.date',
  description: 'Date of the incident, normalized to YYYY-MM-DD',
  labels: [
    'Date of (?:Loss|Incident|Accident)',
    '(?:Incident|Accident|Loss) Date',
  ],
  parse: parseDate,
});

export const incidentTimeExtractor = new LabeledLineExtractor({
  fieldPath: 'incidentInformation.time',
  description: 'Time of the incident, normalized to 24-hour HH:MM',
  labels: [
    'Time of (?:Loss|Incident|Accident)',
    '(?:Incident|Accident|Loss) Time',
  ],
  parse: parseTime,
});

export const incidentLocationExtractor = new LabeledLineExtractor({
  fieldPath: 'incidentInformation.location',
  description: 'Where the incident happened',
  labels: [
    'Location of (?:Loss|Incident|Accident)',
    '(?:Incident|Accident|Loss) Location',
    'Location',
  ],
  parse: parseFreeText,
});

export const incidentDescriptionExtractor = new LabeledBlockExtractor({
  fieldPath: 'incidentInformation.description',
  description: 'Narrative of the incident; may span several lines',
  labels: [
    'Description of (?:Loss|Incident|Accident)',
    '(?:Incident|Accident|Loss) Description',
    'Description',
  ],
  parse: parseFreeText,
});
