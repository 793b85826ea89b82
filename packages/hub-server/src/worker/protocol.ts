import type { MessagePayload, RecommendationResult } from '../types.js';

export const RECOMMENDATION_REQUEST = 'recommendation_request';
export const RECOMMENDATION_RESPONSE = 'recommendation_response';
export const RECOMMENDATION_ERROR = 'recommendation_error';

export interface RecommendationRequestPayload extends MessagePayload {
  type: typeof RECOMMENDATION_REQUEST;
  from_user_id: string;
  query: string;
}

export interface RecommendationResponsePayload extends MessagePayload {
  type: typeof RECOMMENDATION_RESPONSE;
  original_message_id: string;
  query: string;
  profile_user_id: string;
  result: RecommendationResult;
}

export interface RecommendationErrorPayload extends MessagePayload {
  type: typeof RECOMMENDATION_ERROR;
  reason: string;
  original_message_id: string;
}

export function requestPayload(fromUserId: string, query: string): RecommendationRequestPayload {
  return { type: RECOMMENDATION_REQUEST, from_user_id: fromUserId, query };
}

export function payloadType(payload: MessagePayload): unknown {
  return payload['type'];
}

/** Non-empty string field of a payload, or undefined. */
export function stringField(payload: MessagePayload, key: string): string | undefined {
  const value = payload[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}
