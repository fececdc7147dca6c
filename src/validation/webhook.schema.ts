/**
 * Provider webhook payload schemas.
 *
 * Only the fields the gateway reads are declared; everything else passes
 * through untouched.
 */

import { z } from 'zod';

const optionalText = z.string().nullish();
const looseObject = z.record(z.unknown());

// Analytics sub-fields never fail a post-call delivery; a wrong type reads as absent
const lenientText = optionalText.catch(undefined);
const lenientObject = looseObject.nullish().catch(undefined);

const lenientNumber = z
  .preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
    z.number().finite().nullish()
  )
  .catch(null);

export const conversationAnalysisSchema = z
  .object({
    call_successful: lenientText,
    call_summary: lenientText,
    transcript_summary: lenientText,
    data_collection: lenientObject,
    evaluation_criteria_results: lenientObject,
  })
  .passthrough();

/** Only conversation_id can fail a post-call delivery */
export const postCallSchema = z
  .object({
    conversation_id: z.string().min(1),
    agent_id: lenientText,
    status: lenientText,
    call_duration_secs: lenientNumber,
    call_sid: lenientText,
    phone_number: lenientText,
    analysis: conversationAnalysisSchema.nullish().catch(null),
    human_transfer: lenientText,
    collected_data: lenientObject,
  })
  .passthrough();

/** Cal.com delivery envelope: `{ triggerEvent, createdAt, payload }` */
export const calcomWebhookSchema = z.object({
  triggerEvent: z.string().min(1),
  createdAt: optionalText,
  payload: z
    .object({
      bookingId: z.union([z.number(), z.string()]).nullish(),
      uid: optionalText,
      title: optionalText,
      startTime: optionalText,
      endTime: optionalText,
      location: optionalText,
      status: optionalText,
      rescheduleReason: optionalText,
      cancellationReason: optionalText,
      attendees: z
        .array(
          z
            .object({
              name: optionalText,
              email: optionalText,
              phoneNumber: optionalText,
            })
            .passthrough()
        )
        .nullish(),
      organizer: z.object({ name: optionalText, email: optionalText }).passthrough().nullish(),
      metadata: looseObject.nullish(),
    })
    .passthrough()
    .default({}),
});

export type PostCallPayload = z.infer<typeof postCallSchema>;
export type CalcomWebhookPayload = z.infer<typeof calcomWebhookSchema>;
