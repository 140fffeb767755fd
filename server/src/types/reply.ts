// Shared records for the reply generation pipeline

export type ReplyTone = 'formal' | 'business' | 'casual';

export const REPLY_TONES: readonly ReplyTone[] = ['formal', 'business', 'casual'];

export type EmailCategory =
  | 'scheduling'
  | 'question'
  | 'request'
  | 'problem_report'
  | 'follow_up'
  | 'update'
  | 'acknowledgment'
  | 'general';

export type UrgencyLevel = 'normal' | 'high' | 'urgent';

export type RelationshipTier = 'new' | 'occasional' | 'frequent';

export type ConfidenceLevel = 'low' | 'medium' | 'high';

export type GenerationMethod =
  | 'content_specific'
  | 'safe_mode'
  | 'optional_acknowledgment'
  | 'no_reply_needed'
  | 'no_reply'
  | 'failed';

export interface EmailInput {
  readonly subject: string;
  readonly body: string;
  readonly senderEmail: string;
  readonly senderName: string;
  readonly hasAttachments?: boolean;
  readonly attachmentCount?: number;
}

/**
 * Structured signals pulled out of an email. Absent signals are empty
 * collections or an empty string, never missing keys.
 */
export interface ExtractedContext {
  readonly questions: readonly string[];
  readonly actionItems: readonly string[];
  readonly deadlines: readonly string[];
  readonly mainTopic: string;
  readonly emailCategory: EmailCategory;
  readonly urgencyLevel: UrgencyLevel;
  readonly keyPhrases: readonly string[];
  readonly senderName: string;
  readonly subject: string;
  readonly hasAttachments: boolean;
  readonly attachmentCount: number;
  readonly extractedSuccessfully: boolean;
}

export interface SenderProfile {
  readonly senderEmail: string;
  readonly interactions: number;
  readonly relationship: RelationshipTier;
  readonly preferredTone: ReplyTone | null;
  readonly firstSeen: string | null;
  readonly lastInteraction: string | null;
  readonly ephemeral: boolean;
}

export interface ReplyDraft {
  text: string;
  confidence: number;
  notes: string[];
}

export interface ToneAdaptationRecord {
  readonly original: ReplyTone;
  readonly adapted: ReplyTone;
  readonly reason: string;
  readonly changes: readonly string[];
}

export interface SenderProfileSnapshot {
  readonly interactions: number;
  readonly relationship: RelationshipTier;
  readonly preferredTone: ReplyTone | null;
}

export interface ReplyMetadata {
  readonly senderProfile?: SenderProfileSnapshot;
  readonly toneAdapted?: ToneAdaptationRecord;
  readonly category?: EmailCategory;
  readonly topic?: string;
  readonly urgency?: UrgencyLevel;
  readonly learningNotes?: readonly string[];
  readonly learningAdjustment?: number;
  readonly confidenceSignals?: readonly string[];
  readonly confidencePenalties?: readonly string[];
  readonly replyNecessity?: ReplyNecessity;
  readonly edgeCase?: EdgeCaseAnalysis;
  readonly sensitive?: SensitiveAnalysis;
  readonly requiresManualReview?: boolean;
}

export interface ReplyResult {
  readonly replyText: string | null;
  readonly confidenceScore: number;
  readonly confidenceLevel: ConfidenceLevel;
  readonly generationMethod: GenerationMethod;
  readonly metadata: ReplyMetadata;
  readonly error?: string;
}

export type NecessityLevel = 'required' | 'optional' | 'not_needed' | 'action_only';

export type EmailIntent =
  | 'automated'
  | 'security_alert'
  | 'transactional'
  | 'marketing'
  | 'newsletter'
  | 'announcement'
  | 'invitation'
  | 'notification'
  | 'request'
  | 'question'
  | 'problem_report'
  | 'general';

export interface ReplyNecessity {
  readonly needsReply: boolean;
  readonly necessityLevel: NecessityLevel;
  readonly emailIntent: EmailIntent;
  readonly reason: string;
  readonly suggestedAction: string;
}

export type EdgeCaseType = 'no_reply' | 'very_short' | 'too_long' | 'unclear' | 'multiple_topics';

export interface EdgeCaseAnalysis {
  readonly isEdgeCase: boolean;
  readonly edgeCaseType: EdgeCaseType | null;
  readonly shouldGenerateReply: boolean;
  readonly recommendation: string;
}

export type SensitiveCategory =
  | 'legal'
  | 'hr_personnel'
  | 'financial_sensitive'
  | 'confidential'
  | 'crisis'
  | 'ethical';

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export interface SensitiveAnalysis {
  readonly isSensitive: boolean;
  readonly categories: readonly SensitiveCategory[];
  readonly matchedKeywords: readonly string[];
  readonly riskLevel: RiskLevel;
  readonly requiresManualReview: boolean;
}

export type ContentKind = 'deadline' | 'action_item' | 'question' | 'topic';

export const CONTENT_KINDS: readonly ContentKind[] = ['deadline', 'action_item', 'question', 'topic'];

/**
 * Order in which extracted signals become body sentences when an email
 * carries several of them. Overridable through configuration.
 */
export const DEFAULT_CONTENT_PRIORITY: readonly ContentKind[] = ['deadline', 'action_item', 'question', 'topic'];
