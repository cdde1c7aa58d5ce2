import { PostalAddressSchema } from '@wayfarer/domain';
import { z } from 'zod';

import { type MapsClient, parseRequest } from './client';

const TITLE = 'Address Validation API';

export const AddressValidationRequestSchema = z.object({
  address: PostalAddressSchema,
  /** Set when re-validating an address the user corrected after a previous response. */
  previousResponseId: z.string().min(1).optional(),
  enableUspsCass: z.boolean().optional(),
  sessionToken: z.string().min(1).optional()
});

export type AddressValidationRequest = z.input<typeof AddressValidationRequestSchema>;

export const VerdictSchema = z
  .object({
    inputGranularity: z.string().optional(),
    validationGranularity: z.string().optional(),
    geocodeGranularity: z.string().optional(),
    addressComplete: z.boolean().optional(),
    hasUnconfirmedComponents: z.boolean().optional(),
    hasInferredComponents: z.boolean().optional(),
    hasReplacedComponents: z.boolean().optional()
  })
  .passthrough();

export const AddressValidationResponseSchema = z
  .object({
    result: z
      .object({
        verdict: VerdictSchema.optional(),
        address: z
          .object({
            formattedAddress: z.string().optional(),
            missingComponentTypes: z.array(z.string()).optional(),
            unconfirmedComponentTypes: z.array(z.string()).optional()
          })
          .passthrough()
          .optional()
      })
      .passthrough(),
    responseId: z.string()
  })
  .passthrough();

export type AddressValidationResponse = z.infer<typeof AddressValidationResponseSchema>;

export const fetchAddressValidation = async (
  client: MapsClient,
  input: AddressValidationRequest
): Promise<AddressValidationResponse> => {
  const body = parseRequest(AddressValidationRequestSchema, input, TITLE);

  return client.request({
    title: TITLE,
    apis: ['AddressValidation'],
    method: 'POST',
    service: 'addressValidation',
    path: 'v1:validateAddress',
    body,
    auth: 'header',
    schema: AddressValidationResponseSchema
  });
};

/**
 * How the caller used the result of a validation. Sent once per validation sequence.
 */
export const ValidationConclusionSchema = z.enum([
  'VALIDATED_VERSION_USED',
  'USER_VERSION_USED',
  'UNVALIDATED_VERSION_USED',
  'UNUSED'
]);

export const ValidationFeedbackRequestSchema = z.object({
  conclusion: ValidationConclusionSchema,
  /** `responseId` of the first validation in the sequence. */
  responseId: z.string().min(1, 'responseId must not be empty')
});

export type ValidationConclusion = z.infer<typeof ValidationConclusionSchema>;
export type ValidationFeedbackRequest = z.input<typeof ValidationFeedbackRequestSchema>;

export const ValidationFeedbackResponseSchema = z.object({}).passthrough();

export type ValidationFeedbackResponse = z.infer<typeof ValidationFeedbackResponseSchema>;

export const provideValidationFeedback = async (
  client: MapsClient,
  input: ValidationFeedbackRequest
): Promise<ValidationFeedbackResponse> => {
  const body = parseRequest(ValidationFeedbackRequestSchema, input, TITLE);

  return client.request({
    title: TITLE,
    apis: ['AddressValidation'],
    method: 'POST',
    service: 'addressValidation',
    path: 'v1:provideValidationFeedback',
    body,
    auth: 'header',
    schema: ValidationFeedbackResponseSchema
  });
};
