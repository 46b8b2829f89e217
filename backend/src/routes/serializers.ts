/**
 * Response Serializers
 *
 * Domain objects carry Date values; responses carry ISO strings.
 */

import { cardKey, type Card, type CardResponse, type ReviewState, type Session } from "@study-loop/shared";

export interface SessionResponse {
  id: number | null;
  startTime: string;
  endTime: string | null;
  cardsReviewed: number;
  newCards: number;
  reviewedCards: number;
}

export interface ReviewStateResponse {
  cardKey: string;
  reviewCount: number;
  lastReview: string | null;
  due: string;
}

export function toCardResponse(card: Card): CardResponse {
  return {
    id: card.id,
    key: cardKey(card),
    question: card.question,
    answer: card.answer,
    sourceFile: card.sourceFile,
    sourceLine: card.sourceLine,
    sourceContext: card.sourceContext,
    promptKind: card.promptKind,
    tags: card.tags,
    createdAt: card.createdAt.toISOString(),
  };
}

export function toSessionResponse(session: Session): SessionResponse {
  return {
    id: session.id,
    startTime: session.startTime.toISOString(),
    endTime: session.endTime ? session.endTime.toISOString() : null,
    cardsReviewed: session.cardsReviewed,
    newCards: session.newCards,
    reviewedCards: session.reviewedCards,
  };
}

export function toReviewStateResponse(state: ReviewState): ReviewStateResponse {
  return {
    cardKey: state.cardKey,
    reviewCount: state.reviewCount,
    lastReview: state.lastReview ? state.lastReview.toISOString() : null,
    due: state.due.toISOString(),
  };
}
