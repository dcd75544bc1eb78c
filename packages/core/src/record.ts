/**
 * Claim Record Access
 *
 * Typed access to record leaves by dotted path, and conversion of a record
 * to its JSON form where absent leaves become null.
 */

import {
  fieldValue,
  type ExtractedFields,
  type ExtractedFieldsJson,
  type Field,
  type FieldPath,
  type FieldValueMap,
} from './types';

type FieldAccessors = { [P in FieldPath]: (fields: ExtractedFields) => Field<FieldValueMap[P]> };

const FIELD_ACCESSORS: FieldAccessors = {
  'policyInformation.policyNumber': (f) => f.policyInformation.policyNumber,
  'policyInformation.policyholderName': (f) => f.policyInformation.policyholderName,
  'policyInformation.effectiveDates.start': (f) => f.policyInformation.effectiveDates.start,
  'policyInformation.effectiveDates.end': (f) => f.policyInformation.effectiveDates.end,
  'incidentInformation.date': (f) => f.incidentInformation.date,
  'incidentInformation.time': (f) => f.incidentInformation.time,
  'incidentInformation.location': (f) => f.incidentInformation.location,
  'incidentInformation.description': (f) => f.incidentInformation.description,
  'involvedParties.claimant': (f) => f.involvedParties.claimant,
  'involvedParties.thirdParties': (f) => f.involvedParties.thirdParties,
  'involvedParties.contactDetails.phone': (f) => f.involvedParties.contactDetails.phone,
  'involvedParties.contactDetails.email': (f) => f.involvedParties.contactDetails.email,
  'assetDetails.assetType': (f) => f.assetDetails.assetType,
  'assetDetails.assetId': (f) => f.assetDetails.assetId,
  'assetDetails.estimatedDamage': (f) => f.assetDetails.estimatedDamage,
  'otherMandatoryFields.claimType': (f) => f.otherMandatoryFields.claimType,
  'otherMandatoryFields.attachments': (f) => f.otherMandatoryFields.attachments,
  'otherMandatoryFields.initialEstimate': (f) => f.otherMandatoryFields.initialEstimate,
};

/**
 * Read a leaf of the record by its dotted path.
 */
export function getField<P extends FieldPath>(fields: ExtractedFields, fieldPath: P): Field<FieldValueMap[P]> {
  return FIELD_ACCESSORS[fieldPath](fields);
}

/**
 * Mandatory paths whose field is absent, in checklist order.
 */
export function findMissingFields(
  fields: ExtractedFields,
  mandatoryFields: readonly FieldPath[]
): FieldPath[] {
  return mandatoryFields.filter((fieldPath) => getField(fields, fieldPath).status === 'absent');
}

function listValue(field: Field<readonly string[]>): string[] | null {
  const value = fieldValue(field);
  return value === null ? null : [...value];
}

/**
 * JSON form of the extracted fields: same nesting, absent leaves as null.
 */
export function toExtractedFieldsJson(fields: ExtractedFields): ExtractedFieldsJson {
  const { policyInformation, incidentInformation, involvedParties, assetDetails, otherMandatoryFields } =
    fields;

  return {
    policyInformation: {
      policyNumber: fieldValue(policyInformation.policyNumber),
      policyholderName: fieldValue(policyInformation.policyholderName),
      effectiveDates: {
        start: fieldValue(policyInformation.effectiveDates.start),
        end: fieldValue(policyInformation.effectiveDates.end),
      },
    },
    incidentInformation: {
      date: fieldValue(incidentInformation.date),
      time: fieldValue(incidentInformation.time),
      location: fieldValue(incidentInformation.location),
      description: fieldValue(incidentInformation.description),
    },
    involvedParties: {
      claimant: fieldValue(involvedParties.claimant),
      thirdParties: listValue(involvedParties.thirdParties),
      contactDetails: {
        phone: fieldValue(involvedParties.contactDetails.phone),
        email: fieldValue(involvedParties.contactDetails.email),
      },
    },
    assetDetails: {
      assetType: fieldValue(assetDetails.assetType),
      assetId: fieldValue(assetDetails.assetId),
      estimatedDamage: fieldValue(assetDetails.estimatedDamage),
    },
    otherMandatoryFields: {
      claimType: fieldValue(otherMandatoryFields.claimType),
      attachments: listValue(otherMandatoryFields.attachments),
      initialEstimate: fieldValue(otherMandatoryFields.initialEstimate),
    },
  };
}
