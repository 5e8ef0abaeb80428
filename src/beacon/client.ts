import fetch from 'node-fetch';
import { z } from 'zod';
import { isHex, type Hex } from 'viem';
import { logger } from '../shared/logger.js';
import { ChainClientError } from '../shared/errors.js';
import { type Result, Ok, Err, toError } from '../shared/result.js';
import { SLOTS_PER_EPOCH, type BeaconClientConfig, type BeaconHead, type ValidatorStatus } from './types.js';

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const uint = z.string().regex(/^\d+$/).transform((value) => BigInt(value));
const hex = z.string().refine((value): value is Hex => isHex(value), { message: 'Expected hex string' });

// /eth/v1/beacon/headers/head
const headerResponseSchema = z.object({
  data: z.object({
    root: z.string(),
    header: z.object({
      message: z.object({ slot: uint }),
    }),
  }),
});

// /eth/v1/beacon/states/{state_id}/validators
const validatorsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: uint,
      balance: uint,
      status: z.string(),
      validator: z.object({
        pubkey: hex,
        activation_epoch: uint,
      }),
    })
  ),
});

// Requests per call; keeps POST bodies well under common proxy limits.
const VALIDATOR_BATCH_SIZE = 100;

export const createBeaconClient = (config: BeaconClientConfig) => {
  const baseUrl = config.beaconApiUrl.endsWith('/') ? config.beaconApiUrl : `${config.beaconApiUrl}/`;

  const request = async <S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    body?: unknown
  ): Promise<Result<z.output<S>, ChainClientError>> => {
    const url = `${baseUrl}${path}`;
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= config.retryCount; attempt++) {
      try {
        logger.debug(`[BeaconClient] Attempt ${attempt}: ${body === undefined ? 'GET' : 'POST'} ${url}`);
        const response = await fetch(url, {
          method: body === undefined ? 'GET' : 'POST',
          headers: {
            'Accept': 'application/json',
            ...(body !== undefined && { 'Content-Type': 'application/json' }),
          },
          ...(body !== undefined && { body: JSON.stringify(body) }),
          signal: AbortSignal.timeout(config.timeoutMs),
        });

        if (!response.ok) {
          const errorBody = await response.text();
          throw new Error(`Beacon API request failed with status ${response.status}: ${errorBody}`);
        }

        const parsed = schema.safeParse(await response.json());
        if (!parsed.success) {
          // A malformed payload will not fix itself on retry
          return Err(new ChainClientError(`Malformed beacon response from ${path}: ${parsed.error.message}`, 'beacon'));
        }
        return Ok(parsed.data);
      } catch (e) {
        lastError = toError(e);
        logger.warn(`[BeaconClient] Attempt ${attempt} failed for ${path}: ${lastError.message}`);
        if (attempt < config.retryCount) {
          await sleep(config.retryDelayMs);
        }
      }
    }

    return Err(new ChainClientError(
      `Beacon API ${path} unreachable after ${config.retryCount} attempts: ${lastError?.message ?? 'no response'}`,
      'beacon',
      { cause: lastError }
    ));
  };

  const getBeaconHead = async (): Promise<Result<BeaconHead, ChainClientError>> => {
    const header = await request('eth/v1/beacon/headers/head', headerResponseSchema);
    if (!header.ok) return header;

    const slot = header.value.data.header.message.slot;
    return Ok({ slot, epoch: slot / SLOTS_PER_EPOCH });
  };

  /**
   * Validator records for the given pubkeys at a state id (slot, root or
   * `head`), keyed by lowercase pubkey. Pubkeys the beacon chain has not seen
   * are absent from the map.
   */
  const getValidators = async (
    pubkeys: readonly Hex[],
    stateId: string
  ): Promise<Result<Map<string, ValidatorStatus>, ChainClientError>> => {
    const validators = new Map<string, ValidatorStatus>();

    for (let i = 0; i < pubkeys.length; i += VALIDATOR_BATCH_SIZE) {
      const ids = pubkeys.slice(i, i + VALIDATOR_BATCH_SIZE);
      const result = await request(`eth/v1/beacon/states/${stateId}/validators`, validatorsResponseSchema, { ids });
      if (!result.ok) return result;

      for (const entry of result.value.data) {
        validators.set(entry.validator.pubkey.toLowerCase(), {
          pubkey: entry.validator.pubkey,
          index: entry.index,
          balance: entry.balance,
          activationEpoch: entry.validator.activation_epoch,
          status: entry.status,
        });
      }
    }

    return Ok(validators);
  };

  return {
    getBeaconHead,
    getValidators,
  };
};

export type BeaconClient = ReturnType<typeof createBeaconClient>;
