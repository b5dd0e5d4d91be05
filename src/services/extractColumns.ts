/**
 * Column aliases for uploaded extracts. Headers are canonicalized
 * ("First Name" → "first_name") and then looked up here.
 */

export type RecordField =
  | 'firstName'
  | 'lastName'
  | 'fullName'
  | 'patientId'
  | 'facility'
  | 'payerType'
  | 'encounterDate'
  | 'placeOfServiceCode'
  | 'cptCodes'
  | 'admissionDate'
  | 'dischargeDate'
  | 'dischargeDisposition'
  | 'lengthOfStayDays'
  | 'startScore'
  | 'endScore';

export const COLUMN_ALIASES: Readonly<Record<string, RecordField>> = {
  first_name: 'firstName',
  firstname: 'firstName',
  last_name: 'lastName',
  lastname: 'lastName',
  patient_name: 'fullName',
  resident_name: 'fullName',
  name: 'fullName',
  patient_id: 'patientId',
  resident_id: 'patientId',
  mrn: 'patientId',
  facility: 'facility',
  facility_name: 'facility',
  payer: 'payerType',
  payer_type: 'payerType',
  payor: 'payerType',
  payor_type: 'payerType',
  date_of_service: 'encounterDate',
  dos: 'encounterDate',
  encounter_date: 'encounterDate',
  visit_date: 'encounterDate',
  pos: 'placeOfServiceCode',
  place_of_service: 'placeOfServiceCode',
  cpt: 'cptCodes',
  cpt_code: 'cptCodes',
  cpt_codes: 'cptCodes',
  admission_date: 'admissionDate',
  admit_date: 'admissionDate',
  discharge_date: 'dischargeDate',
  to_type: 'dischargeDisposition',
  discharge_to: 'dischargeDisposition',
  days: 'lengthOfStayDays',
  los: 'lengthOfStayDays',
  start_score: 'startScore',
  gg_start: 'startScore',
  end_score: 'endScore',
  gg_end: 'endScore',
};

/**
 * "First Name " → "first_name"; unknown headers keep their canonical text.
 */
export function canonicalColumnName(header: string): string {
  const canonical = header
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return COLUMN_ALIASES[canonical] ?? canonical;
}
