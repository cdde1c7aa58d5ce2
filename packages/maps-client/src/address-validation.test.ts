import { GOOGLE_URLS, createGoogleSequenceHandler, googleJson } from '@wayfarer/msw/handlers/google';
import { addressValidationFixture } from '@wayfarer/msw/fixtures/google';
import { mockServer } from '@wayfarer/msw/server';
import { describe, expect, it } from 'vitest';

import { fetchAddressValidation, provideValidationFeedback } from './address-validation';
import { createMapsClient } from './client';

const createClient = () => createMapsClient({ apiKey: 'test-key', sleep: async () => {} });

describe('fetchAddressValidation', () => {
  it('posts the address and returns the verdict', async () => {
    const requests: Request[] = [];
    mockServer.use(
      createGoogleSequenceHandler(
        'post',
        GOOGLE_URLS.addressValidation,
        [googleJson(addressValidationFixture)],
        (_attempt, request) => {
          requests.push(request.clone());
        }
      )
    );

    const response = await fetchAddressValidation(createClient(), {
      address: { regionCode: 'GB', addressLines: ['12 Harbour Road', 'Port Elin PE1 2AB'] },
      enableUspsCass: false
    });

    expect(response.responseId).toBe('test-response-1');
    expect(response.result.verdict?.addressComplete).toBe(true);
    expect(requests[0]?.headers.get('X-Goog-Api-Key')).toBe('test-key');
    await expect(requests[0]?.json()).resolves.toEqual({
      address: { regionCode: 'GB', addressLines: ['12 Harbour Road', 'Port Elin PE1 2AB'] },
      enableUspsCass: false
    });
  });

  it('requires at least one address line', async () => {
    await expect(
      fetchAddressValidation(createClient(), { address: { regionCode: 'GB', addressLines: [] } })
    ).rejects.toMatchObject({ code: 'INVALID_REQUEST', message: 'Invalid Address Validation API request' });
  });

  it('surfaces the error message of a rejected call', async () => {
    mockServer.use(
      createGoogleSequenceHandler('post', GOOGLE_URLS.addressValidation, [
        googleJson({ error: { code: 400, message: 'Unsupported region code.', status: 'INVALID_ARGUMENT' } }, 400)
      ])
    );

    await expect(
      fetchAddressValidation(createClient(), { address: { regionCode: 'ZZ', addressLines: ['1 Test Street'] } })
    ).rejects.toMatchObject({
      code: 'CLIENT_ERROR',
      status: 400,
      message: 'Address Validation API returned HTTP 400: Unsupported region code.'
    });
  });
});

describe('provideValidationFeedback', () => {
  it('posts the conclusion for a validation sequence', async () => {
    const requests: Request[] = [];
    mockServer.use(
      createGoogleSequenceHandler('post', GOOGLE_URLS.validationFeedback, [googleJson({})], (_attempt, request) => {
        requests.push(request.clone());
      })
    );

    const response = await provideValidationFeedback(createClient(), {
      conclusion: 'VALIDATED_VERSION_USED',
      responseId: 'test-response-1'
    });

    expect(response).toEqual({});
    expect(requests[0]?.headers.get('X-Goog-Api-Key')).toBe('test-key');
    await expect(requests[0]?.json()).resolves.toEqual({
      conclusion: 'VALIDATED_VERSION_USED',
      responseId: 'test-response-1'
    });
  });

  it('requires the response ID of the sequence', async () => {
    await expect(
      provideValidationFeedback(createClient(), { conclusion: 'UNUSED', responseId: '' })
    ).rejects.toMatchObject({ code: 'INVALID_REQUEST', message: 'Invalid Address Validation API request' });
  });
});
