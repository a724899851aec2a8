import { z } from 'zod'

const hexString = z.string().regex(/^0x[0-9a-fA-F]*$/, 'expected 0x-prefixed hex string')

export const blockSchema = z.object({
  id: hexString,
  number: z.number().int().nonnegative(),
  parentID: hexString,
  timestamp: z.number().int().nonnegative(),
  gasLimit: z.number().int().nonnegative(),
  gasUsed: z.number().int().nonnegative().optional(),
  size: z.number().int().nonnegative().optional(),
  transactions: z.array(hexString).default([]),
})

export const sendTransactionResultSchema = z.object({
  id: hexString,
})

const eventSchema = z.object({
  address: hexString,
  topics: z.array(hexString),
  data: hexString,
})

const transferSchema = z.object({
  sender: hexString,
  recipient: hexString,
  amount: hexString,
})

const outputSchema = z.object({
  contractAddress: hexString.nullable().default(null),
  events: z.array(eventSchema).default([]),
  transfers: z.array(transferSchema).default([]),
  vmError: z.string().optional(),
})

export const receiptSchema = z.object({
  gasUsed: z.number().int().nonnegative(),
  gasPayer: hexString,
  paid: hexString,
  reward: hexString,
  reverted: z.boolean(),
  meta: z.object({
    blockID: hexString,
    blockNumber: z.number().int().nonnegative(),
    blockTimestamp: z.number().int().nonnegative(),
    txID: hexString,
    txOrigin: hexString,
  }),
  outputs: z.array(outputSchema),
})

export type Block = z.output<typeof blockSchema>
export type SendTransactionResult = z.output<typeof sendTransactionResultSchema>
export type TransactionReceipt = z.output<typeof receiptSchema>
export type ReceiptOutput = z.output<typeof outputSchema>
