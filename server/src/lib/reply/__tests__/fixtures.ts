import { emptyContext } from '../../context/context-extractor';
import { ExtractedContext, RelationshipTier, SenderProfile } from '../../../types/reply';

export function makeContext(overrides: Partial<ExtractedContext> = {}): ExtractedContext {
  return {
    ...emptyContext({ senderName: 'Sarah Chen', subject: 'Test' }),
    extractedSuccessfully: true,
    ...overrides
  };
}

export function makeProfile(relationship: RelationshipTier, interactions = 1): SenderProfile {
  return {
    senderEmail: 'sarah@example.com',
    interactions,
    relationship,
    preferredTone: null,
    firstSeen: null,
    lastInteraction: null,
    ephemeral: false
  };
}
