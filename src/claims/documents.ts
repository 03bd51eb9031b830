/**
 * Incident classification and the mandatory document checklists.
 */

import type {
  DocumentGuidance,
  DocumentStatus,
  DocumentStatusLabel,
  IncidentType,
} from '../types/models.js';

/** Specific incident types in checklist merge order. */
export const INCIDENT_ORDER: readonly Exclude<IncidentType, 'general'>[] = [
  'auto',
  'death',
  'medical',
  'property',
  'disability',
];

const INCIDENT_KEYWORDS: Record<Exclude<IncidentType, 'general'>, RegExp> = {
  auto: /\b(car|cars|vehicle|automobile|truck|motorcycle|collision|collided|crash(?:ed)?|rear-ended|driver|driving|traffic|highway|windshield)\b/i,
  death: /\b(death|died|dies|deceased|passed away|fatal(?:ity)?|funeral|decedent)\b/i,
  medical: /\b(hospital(?:ised|ized)?|surgery|doctor|medical|treatment|diagnos(?:is|ed)|illness|emergency room|clinic|prescription)\b/i,
  property: /\b(house|home|apartment|roof|fire|flood(?:ed|ing)?|burglary|burgled|theft|stolen|break-in|water damage|storm|property)\b/i,
  disability: /\b(disability|disabled|unable to work|incapacitated|impairment|paralys(?:is|ed))\b/i,
};

export const CHECKLISTS: Readonly<Record<IncidentType, readonly string[]>> = {
  auto: [
    'Police Report',
    'Repair/Replacement Estimate',
    'Photographs of Damage',
    "Driver's Licence Copy",
  ],
  death: ['Certified Death Certificate', 'Medical Records', "Coroner's Report"],
  medical: ["Doctor's Report", 'Hospital Discharge Summary', 'Itemised Bills'],
  property: ['Police/Fire Report', 'Photographs of Damage', 'Repair/Replacement Estimate'],
  disability: ["Physician's Statement", 'Employer Letter', 'Medical Records'],
  general: [
    'Incident Report',
    'Witness Statement (1)',
    'Witness Statement (2)',
    'Photographs',
    'Receipts/Bills',
  ],
};

/** Checklist used when the decision could not be parsed. */
export const FALLBACK_CHECKLIST: readonly string[] = [
  'Incident report',
  'Photo evidence',
  'Policy certificate',
];

/** What an investigator asks a flagged claimant to gather. */
export const INVESTIGATION_CHECKLIST: readonly string[] = [
  'Government-issued photo ID',
  'Original policy certificate',
  'Incident report / police report',
  'Two independent witness statements',
  'Photographs of damage / evidence',
  'Itemised cost estimate or receipts',
];

export function inferIncidentTypes(narrative: string): IncidentType[] {
  const matched = INCIDENT_ORDER.filter((type) => INCIDENT_KEYWORDS[type].test(narrative));
  return matched.length > 0 ? matched : ['general'];
}

/** Union of the checklists for `types`, first occurrence wins. */
export function checklistFor(types: readonly IncidentType[]): string[] {
  return dedupeDocuments(types.flatMap((type) => CHECKLISTS[type]));
}

export function documentKey(name: string): string {
  return name.trim().toLowerCase();
}

/** Case-insensitive dedupe that keeps the first spelling and the original order. */
export function dedupeDocuments(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const name of names) {
    const key = documentKey(name);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    result.push(name.trim());
  }
  return result;
}

export interface DocumentClassification {
  verified: readonly string[];
  unverified: readonly string[];
  missing: readonly string[];
}

/**
 * Place every checklist document in exactly one bucket.
 * When a document shows up in several lists the least favourable one wins;
 * a document nobody classified is missing.
 */
export function partitionChecklist(
  checklist: readonly string[],
  classified: DocumentClassification
): DocumentStatus {
  const verified = new Set(classified.verified.map(documentKey));
  const unverified = new Set(classified.unverified.map(documentKey));
  const missing = new Set(classified.missing.map(documentKey));

  const status: DocumentStatus = { verified: [], unverified: [], missing: [] };
  for (const doc of checklist) {
    const key = documentKey(doc);
    if (missing.has(key)) status.missing.push(doc);
    else if (unverified.has(key)) status.unverified.push(doc);
    else if (verified.has(key)) status.verified.push(doc);
    else status.missing.push(doc);
  }
  return status;
}

/** Checklist documents the claimant ticked are unverified; the rest are missing. */
export function partitionByDeclaration(
  checklist: readonly string[],
  declared: readonly string[]
): DocumentStatus {
  return partitionChecklist(checklist, { verified: [], unverified: declared, missing: [] });
}

export function genericGuidance(document: string, status: DocumentStatusLabel): DocumentGuidance {
  return {
    document,
    status,
    howToObtain:
      status === 'MISSING'
        ? `Request the ${document} from the organisation that issued it and upload a copy with your claim.`
        : `Upload a clear copy of the ${document} and include its reference number or issuing details in your claim description.`,
    issuingEntity: 'The organisation or authority that issues this document',
    turnaround: '3-10 business days',
    cost: 'Varies by issuer',
    contact: 'Contact the claims helpline if you need help obtaining this document',
  };
}
