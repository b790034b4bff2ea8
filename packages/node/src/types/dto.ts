/**
 * Request and response shapes for the HTTP surface.
 *
 * Wei amounts travel as decimal strings; JSON has no bigint.
 */

import { z } from "zod";
import type { HexString, Send } from "@txrelay/types";

const HEX_PATTERN = /^0x[0-9a-fA-F]*$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

const hex = z
  .string()
  .refine((v): v is HexString => HEX_PATTERN.test(v), "Expected 0x-prefixed hex");

const address = z
  .string()
  .refine((v): v is HexString => ADDRESS_PATTERN.test(v), "Expected a 20-byte address");

const wei = z
  .union([z.string().regex(/^\d+$/, "Expected a decimal integer"), z.number().int().nonnegative()])
  .transform((v) => BigInt(v));

// =============================================================================
// Requests
// =============================================================================

export const BuiltCallSchema = z.object({
  chainId: z.number().int().positive(),
  to: address,
  data: hex,
  value: wei,
  gasLimit: wei.optional(),
});

export const SubmitIntentSchema = z.object({
  intentKey: z.string().min(1).max(128),
  signingAddress: z.string().min(1),
  call: BuiltCallSchema,
  metadata: z.record(z.unknown()).optional(),
});

export type SubmitIntentDto = z.infer<typeof SubmitIntentSchema>;

export const ImportWalletSchema = z.object({
  privateKey: z.string().min(1),
});

export type ImportWalletDto = z.infer<typeof ImportWalletSchema>;

export const IntentIdSchema = z.coerce.number().int().positive();

// =============================================================================
// Responses
// =============================================================================

export interface SendDto {
  readonly intentId: number;
  readonly chainId: number;
  readonly signingAddress: string;
  readonly nonce: number;
  readonly maxFeePerGas: string;
  readonly maxPriorityFeePerGas: string;
  readonly gasLimit: string;
  readonly txHash: string;
  readonly sentAt: string;
  readonly replacedBy: string | null;
}

export function toSendDto(send: Send): SendDto {
  return {
    intentId: send.intentId,
    chainId: send.chainId,
    signingAddress: send.signingAddress,
    nonce: send.nonce,
    maxFeePerGas: send.maxFeePerGas.toString(),
    maxPriorityFeePerGas: send.maxPriorityFeePerGas.toString(),
    gasLimit: send.gasLimit.toString(),
    txHash: send.txHash,
    sentAt: send.sentAt,
    replacedBy: send.replacedBy,
  };
}
