/**
 * Fixed claimant-facing messages.
 */

/** Messages shorter than this are replaced by a template. */
export const MIN_MESSAGE_LENGTH = 30;

const DEFAULT_REJECTION_REASON =
  'The incident does not fall within the covered perils of your policy.';

function signOff(sender: string): string {
  return `Warm regards,\n${sender}`;
}

export const INVESTIGATION_REASON =
  'Our automated fraud detection system identified one or more high-risk signals ' +
  'in this claim submission. In keeping with company policy and regulatory ' +
  'obligations, this claim has been escalated to a senior claims investigator ' +
  'for manual review.';

export const INVESTIGATION_NEXT_STEPS = [
  'A senior claims investigator will contact you within 2-3 business days.',
  'Gather all supporting documents and keep them ready.',
  'Do not repair or dispose of damaged items until the investigation is complete.',
  'You may re-submit with additional evidence at any time.',
];

export function investigationMessage(sender: string): string {
  return (
    'Dear Claimant,\n\n' +
    'Thank you for submitting your claim. Our system has flagged certain aspects ' +
    'of this submission for further review by our specialist claims team. A ' +
    'dedicated investigator will contact you within 2-3 business days.\n\n' +
    'You are welcome to re-submit with additional supporting documentation at ' +
    'any time. We appreciate your patience and understanding.\n\n' +
    signOff(sender)
  );
}

export const FALLBACK_REASON = 'Claim routed for manual review due to a processing anomaly.';
export const FALLBACK_SIGNAL = 'System could not fully evaluate the claim narrative';
export const FALLBACK_NEXT_STEPS = [
  'Await contact from a claims representative within 2-3 business days.',
];

export function fallbackMessage(sender: string): string {
  return (
    'Dear Claimant,\n\nYour claim is being reviewed by our team. ' +
    'We will contact you within 2-3 business days.\n\n' +
    signOff(sender)
  );
}

export function pendingDocumentsMessage(missing: readonly string[], sender: string): string {
  const list =
    missing.length > 0
      ? missing.map((d) => `  • ${d}`).join('\n')
      : '  • See the required documents checklist';

  return (
    'Dear Claimant,\n\n' +
    'Thank you for reaching out to us. Your claim appears to be largely valid ' +
    'and we want to help you through this process.\n\n' +
    'However, we are unable to proceed to approval at this stage because the ' +
    'following required document(s) have not been submitted or could not be verified:\n\n' +
    `${list}\n\n` +
    'Please gather these documents and re-submit your claim. Once we receive the ' +
    'complete documentation, your claim will be processed as a priority.\n\n' +
    'Please contact our helpline if you need assistance obtaining any of these documents.\n\n' +
    signOff(sender)
  );
}

export function rejectionMessage(reason: string, sender: string): string {
  return (
    'Dear Claimant,\n\n' +
    'Thank you for submitting your claim. After careful review against your ' +
    'policy terms and conditions, we regret to inform you that this claim ' +
    'cannot be approved at this time.\n\n' +
    `Reason: ${reason.trim() || DEFAULT_REJECTION_REASON}\n\n` +
    'If you believe this decision is incorrect or you have additional ' +
    'information that may change the outcome, you have the right to appeal ' +
    'within 30 days by contacting our disputes resolution team.\n\n' +
    signOff(sender)
  );
}
