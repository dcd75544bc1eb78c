/**
 * Asset Details Extractors
 */

import { LabeledLineExtractor } from '../base-extractor';
import { parseAmount, parseAssetId, parseFreeText } from '../parsers';

export const assetTypeExtractor = new LabeledLineExtractor({
  fieldPath: 'assetDetails.assetType',
  description: 'Kind of asset damaged (Vehicle, Property, ...)',
  labels: ['Asset Type'],
  parse: parseFreeText,
});

export const assetIdExtractor = new LabeledLineExtractor({
  fieldPath: 'assetDetails.assetId',
  description: 'Asset identifier such as a VIN or serial number',
  labels: ['Asset ID', 'VIN', 'Serial Number', 'Serial No\\.?'],
  parse: parseAssetId,
});

export const estimatedDamageExtractor = new LabeledLineExtractor({
  fieldPath: 'assetDetails.estimatedDamage',
  description: 'Estimated damage amount with currency formatting removed',
  labels: ['Estimated Damage Amount', 'Estimated Damage', 'Damage Estimate'],
  parse: parseAmount,
});
