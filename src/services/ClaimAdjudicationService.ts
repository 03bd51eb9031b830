/**
 * Claims adjudication.
 *
 * A claim moves through: fraud pre-filter → context retrieval → grounded
 * decision → parse → override checks. A flagged pre-filter short-circuits to
 * UNDER_INVESTIGATION without calling the model. A decision that cannot be
 * parsed becomes a deterministic UNDER_INVESTIGATION fallback. A decision
 * call that fails after its retries is an UpstreamError, never a verdict.
 *
 * Overrides only ever move a verdict away from APPROVED.
 */

import { UpstreamError } from '../errors.js';
import type { IGenerationProvider } from '../providers/IGenerationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  AdjudicationOverride,
  ClaimAdjudication,
  ClaimSubmission,
  DocumentGuidance,
  FraudAssessment,
  IncidentType,
} from '../types/models.js';
import type { FraudEnsembleService } from './FraudEnsembleService.js';
import type { RetrievalService } from './RetrievalService.js';
import {
  FALLBACK_CHECKLIST,
  INVESTIGATION_CHECKLIST,
  checklistFor,
  dedupeDocuments,
  documentKey,
  genericGuidance,
  inferIncidentTypes,
  partitionByDeclaration,
  partitionChecklist,
} from '../claims/documents.js';
import { parseClaimDecision, type ClaimDecision } from '../claims/decision.js';
import { DECISION_TEMPERATURE, claimDecisionPrompt } from '../claims/prompts.js';
import { assertValidSubmission } from '../claims/submission.js';
import {
  FALLBACK_NEXT_STEPS,
  FALLBACK_REASON,
  FALLBACK_SIGNAL,
  INVESTIGATION_NEXT_STEPS,
  INVESTIGATION_REASON,
  MIN_MESSAGE_LENGTH,
  fallbackMessage,
  investigationMessage,
  pendingDocumentsMessage,
  rejectionMessage,
} from '../claims/templates.js';
import { round } from '../utils/math.js';
import { errorMessage } from '../utils/outcome.js';

export interface ClaimAdjudicationOptions {
  /** Pre-filter score at or above which an APPROVED verdict is overridden. Default: 0.65. */
  fraudOverrideThreshold?: number;
  /** Policy chunks retrieved as context. Default: 5. */
  retrievalK?: number;
  /** Sign-off used in claimant messages. */
  senderName?: string;
}

export class ClaimAdjudicationService {
  private readonly fraudOverrideThreshold: number;
  private readonly retrievalK: number;
  private readonly senderName: string;

  constructor(
    private readonly fraudService: FraudEnsembleService,
    private readonly retrieval: RetrievalService,
    private readonly generation: IGenerationProvider,
    private readonly logger: ILogProvider,
    options: ClaimAdjudicationOptions = {}
  ) {
    this.fraudOverrideThreshold = options.fraudOverrideThreshold ?? 0.65;
    this.retrievalK = options.retrievalK ?? 5;
    this.senderName = options.senderName ?? 'Claims Team';
  }

  async adjudicate(submission: ClaimSubmission): Promise<ClaimAdjudication> {
    assertValidSubmission(submission);
    const narrative = submission.claimDescription;
    const incidentTypes = inferIncidentTypes(narrative);

    this.logger.info('Processing claim', {
      policyNumber: submission.policyNumber ?? null,
      claimAmount: submission.claimAmount ?? null,
      declaredDocuments: submission.submittedDocuments.length,
      incidentTypes,
    });

    // Fraud pre-filter
    const fraud = await this.fraudService.assess(narrative, {
      claimAmount: submission.claimAmount,
    });
    if (fraud.isSuspicious) {
      this.logger.warn('Fraud pre-filter flagged claim', { fraudScore: fraud.fraudScore });
      return this.underInvestigation(submission, fraud, incidentTypes);
    }

    // Context retrieval
    const retrieved = await this.retrieval.tryRetrieveContext(narrative, this.retrievalK);

    // Grounded decision
    const checklist = checklistFor(incidentTypes);
    const prompt = claimDecisionPrompt({
      submission,
      context: retrieved.context,
      incidentTypes,
      checklist,
    });

    let raw: string;
    try {
      raw = await this.generation.generate(prompt, { temperature: DECISION_TEMPERATURE });
    } catch (err) {
      this.logger.error('Claim decision generation failed', { error: errorMessage(err) });
      throw new UpstreamError('Claim decision service is unavailable', {
        cause: errorMessage(err),
      });
    }

    // Parse
    const parsed = parseClaimDecision(raw);
    if (!parsed.ok) {
      this.logger.error('Claim decision could not be parsed', {
        error: parsed.error,
        raw: raw.slice(0, 300),
      });
      return this.parseFallback(submission, fraud, incidentTypes, retrieved.available, parsed.error, raw);
    }

    const result = this.applyDecision(
      submission,
      fraud,
      incidentTypes,
      checklist,
      retrieved.available,
      parsed.decision
    );

    this.logger.info('Adjudication complete', {
      verdict: result.verdict,
      fraudRisk: result.fraudRisk,
      insufficientDocuments: result.missingDocuments.length,
      overrides: result.overridesApplied,
    });
    return result;
  }

  // ── Grounded path ──

  private applyDecision(
    submission: ClaimSubmission,
    fraud: FraudAssessment,
    incidentTypes: IncidentType[],
    checklist: string[],
    coverageVerifiable: boolean,
    decision: ClaimDecision
  ): ClaimAdjudication {
    const fullChecklist = dedupeDocuments([...checklist, ...decision.required_documents_checklist]);
    const documentStatus = partitionChecklist(fullChecklist, {
      verified: decision.document_verification.declared_and_verified,
      unverified: decision.document_verification.declared_but_unverified,
      missing: decision.document_verification.missing,
    });
    // The model's own lists count even for documents outside the checklist
    const insufficient = dedupeDocuments([
      ...decision.missing_documents,
      ...decision.document_verification.declared_but_unverified,
      ...decision.document_verification.missing,
      ...documentStatus.unverified,
      ...documentStatus.missing,
    ]);

    let verdict = decision.verdict;
    let fraudRisk = decision.fraud_risk;
    let internalNotes = decision.internal_notes;
    const overridesApplied: AdjudicationOverride[] = [];

    if (fraud.fraudScore >= this.fraudOverrideThreshold && verdict === 'APPROVED') {
      this.logger.warn('Overriding APPROVED to UNDER_INVESTIGATION', { fraudScore: fraud.fraudScore });
      verdict = 'UNDER_INVESTIGATION';
      fraudRisk = 'HIGH';
      internalNotes = `Decision overridden: pre-filter fraud score ${fraud.fraudScore.toFixed(3)}. ${internalNotes}`.trim();
      overridesApplied.push('fraud_score');
    }

    if (insufficient.length > 0 && verdict === 'APPROVED') {
      this.logger.info('Overriding APPROVED to PENDING_DOCUMENTS', {
        insufficientDocuments: insufficient.length,
      });
      verdict = 'PENDING_DOCUMENTS';
      overridesApplied.push('insufficient_documents');
    }

    const result: ClaimAdjudication = {
      verdict,
      source: 'grounded_decision',
      coverageApplicable: decision.coverage_applicable,
      coverageVerifiable,
      fraudRisk,
      fraudScore: round(Math.max(fraud.fraudScore, decision.fraud_score), 3),
      incidentTypes,
      requiredDocumentsChecklist: fullChecklist,
      documentStatus,
      missingDocuments: insufficient,
      documentGuidance: this.guidance(
        insufficient,
        [...documentStatus.unverified, ...modelOnlyUnverified(decision)],
        decision.document_guidance
      ),
      fraudSignals: decision.fraud_signals_found,
      reason: decision.reason,
      claimantMessage: decision.claimant_message,
      nextSteps: decision.next_steps,
      internalNotes,
      estimatedCoverageAmount: decision.estimated_coverage_amount,
      policyReferences: decision.policy_references,
      submittedDocuments: [...submission.submittedDocuments],
      overridesApplied,
    };

    return this.enrich(result);
  }

  /** One guidance entry per insufficient document, preferring the model's own. */
  private guidance(
    insufficient: string[],
    unverifiedDocuments: readonly string[],
    provided: ClaimDecision['document_guidance']
  ): DocumentGuidance[] {
    const byDocument = new Map<string, ClaimDecision['document_guidance'][number]>();
    for (const entry of provided) byDocument.set(documentKey(entry.document), entry);
    const unverified = new Set(unverifiedDocuments.map(documentKey));

    return insufficient.map((document) => {
      const key = documentKey(document);
      const label = unverified.has(key) ? 'DECLARED_BUT_UNVERIFIED' : 'MISSING';
      const entry = byDocument.get(key);
      const fallback = genericGuidance(document, label);
      if (!entry) return fallback;

      return {
        document,
        status: label,
        howToObtain: entry.how_to_obtain || fallback.howToObtain,
        issuingEntity: entry.issuing_entity || fallback.issuingEntity,
        turnaround: entry.typical_turnaround || fallback.turnaround,
        cost: entry.typical_cost || fallback.cost,
        contact: entry.contact || fallback.contact,
      };
    });
  }

  private enrich(result: ClaimAdjudication): ClaimAdjudication {
    if (result.claimantMessage.trim().length >= MIN_MESSAGE_LENGTH) return result;

    if (result.verdict === 'PENDING_DOCUMENTS') {
      return {
        ...result,
        claimantMessage: pendingDocumentsMessage(result.missingDocuments, this.senderName),
      };
    }
    if (result.verdict === 'REJECTED') {
      return {
        ...result,
        claimantMessage: rejectionMessage(result.reason, this.senderName),
      };
    }
    return result;
  }

  // ── Terminal payloads ──

  private underInvestigation(
    submission: ClaimSubmission,
    fraud: FraudAssessment,
    incidentTypes: IncidentType[]
  ): ClaimAdjudication {
    const checklist = [...INVESTIGATION_CHECKLIST];
    const documentStatus = partitionByDeclaration(checklist, submission.submittedDocuments);
    const insufficient = [...documentStatus.unverified, ...documentStatus.missing];

    return {
      verdict: 'UNDER_INVESTIGATION',
      source: 'fraud_prefilter',
      coverageApplicable: false,
      coverageVerifiable: false,
      fraudRisk: 'HIGH',
      fraudScore: round(fraud.fraudScore, 3),
      incidentTypes,
      requiredDocumentsChecklist: checklist,
      documentStatus,
      missingDocuments: insufficient,
      documentGuidance: this.guidance(insufficient, documentStatus.unverified, []),
      fraudSignals:
        fraud.indicators.length > 0
          ? [...fraud.indicators]
          : ['Multiple automated fraud signals detected'],
      reason: INVESTIGATION_REASON,
      claimantMessage: investigationMessage(this.senderName),
      nextSteps: [...INVESTIGATION_NEXT_STEPS],
      internalNotes:
        `Pre-filter fraud score: ${fraud.fraudScore.toFixed(3)}. ` +
        `Signals: ${fraud.indicators.join('; ') || 'none recorded'}. ` +
        'Requires manual investigation before any payment.',
      estimatedCoverageAmount: 0,
      policyReferences: [],
      submittedDocuments: [...submission.submittedDocuments],
      overridesApplied: [],
    };
  }

  private parseFallback(
    submission: ClaimSubmission,
    fraud: FraudAssessment,
    incidentTypes: IncidentType[],
    coverageVerifiable: boolean,
    error: string,
    raw: string
  ): ClaimAdjudication {
    const checklist = [...FALLBACK_CHECKLIST];
    const documentStatus = partitionByDeclaration(checklist, submission.submittedDocuments);
    const insufficient = [...documentStatus.unverified, ...documentStatus.missing];

    return {
      verdict: 'UNDER_INVESTIGATION',
      source: 'parse_fallback',
      coverageApplicable: false,
      coverageVerifiable,
      fraudRisk: 'MEDIUM',
      fraudScore: round(fraud.fraudScore, 3),
      incidentTypes,
      requiredDocumentsChecklist: checklist,
      documentStatus,
      missingDocuments: insufficient,
      documentGuidance: this.guidance(insufficient, documentStatus.unverified, []),
      fraudSignals: [FALLBACK_SIGNAL],
      reason: FALLBACK_REASON,
      claimantMessage: fallbackMessage(this.senderName),
      nextSteps: [...FALLBACK_NEXT_STEPS],
      internalNotes: `Decision parse error: ${error}. Raw: ${raw.slice(0, 200)}`,
      estimatedCoverageAmount: 0,
      policyReferences: [],
      submittedDocuments: [...submission.submittedDocuments],
      overridesApplied: [],
    };
  }
}

/** Documents the model calls unverified and never calls missing. */
function modelOnlyUnverified(decision: ClaimDecision): string[] {
  const missing = new Set(decision.document_verification.missing.map(documentKey));
  return decision.document_verification.declared_but_unverified.filter(
    (name) => !missing.has(documentKey(name))
  );
}
