// src/config.ts

/**
 * Centralized configuration: environment variables validated once at startup and frozen.
 * Variable names follow the node's env layout (CHAIN_STATE_KEEPER_*, ETH_SENDER_SENDER_*, CONTRACTS_*).
 */

import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { z } from 'zod'
import { ProofLoadingMode, ProofSendingMode, ResourceDimension } from '@sealkeeper/dto'
import { ConfigurationError, reason } from '@sealkeeper/reasons'
import { GWEI, type PriorityFeeStrategyName } from '@sealkeeper/math'

export type EnvSource = Record<string, string | undefined>

export interface ContractsConfig {
  create2FactoryAddr: string
  l1Multicall3Addr: string
  /** target of commit / prove / execute transactions */
  validatorTimelockAddr: string
}

export interface StateKeeperConfig {
  transactionSlots: number
  miniblockCommitDeadlineMs: number
  blockCommitDeadlineMs: number
  maxGasPerBatch: bigint
  maxSingleTxGas: bigint
  maxEthParamsPerBatch: bigint
  maxGeometryPerBatch: bigint
  maxPubdataPerBatch: bigint
  maxTxSize: bigint
  minimalL2GasPrice: bigint
  closeBlockAt: Readonly<Record<ResourceDimension, number>>
  rejectTxAt: Readonly<Record<ResourceDimension, number>>
  firstBatchNumber: number
}

export interface EthSenderConfig {
  maxAggregatedTxGas: bigint
  maxEthTxDataSize: number
  maxAggregatedBlocksToExecute: number
  aggregatedBlockCommitDeadlineMs: number
  aggregatedBlockProveDeadlineMs: number
  aggregatedBlockExecuteDeadlineMs: number
  txPollPeriodMs: number
  aggregateTxPollPeriodMs: number
  txInclusionTimeoutMs: number
  maxFeeBumps: number
  maxTxsInFlight: number
  waitConfirmations: number
  proofSendingMode: ProofSendingMode
  proofLoadingMode: ProofLoadingMode
}

export interface GasAdjusterConfig {
  defaultPriorityFeePerGas: bigint
  maxAcceptablePriorityFee: bigint
  maxBaseFeeSamples: number
  pollPeriodMs: number
  strategy: PriorityFeeStrategyName
}

export interface EthClientConfig {
  web3Url: string
  chainId: number
  operatorPrivateKey?: string
  useLineaEstimateGas: boolean
}

export interface PipelineConfig {
  contracts: ContractsConfig
  stateKeeper: StateKeeperConfig
  ethSender: EthSenderConfig
  gasAdjuster: GasAdjusterConfig
  ethClient: EthClientConfig
  proofStoreUrl?: string
  logLevel: string
}

// integers may be written with `_` separators, as in 100_000_000
const bigintString = z
  .string()
  .trim()
  .regex(/^\d[\d_]*$/, 'expected a non-negative integer')
  .transform(s => BigInt(s.replace(/_/g, '')))

const intString = bigintString.transform(v => Number(v))

const percentage = z.coerce.number().gt(0).lte(1)

const bool = z
  .enum(['1', '0', 'true', 'false'])
  .transform(v => v === '1' || v === 'true')

const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 0x-prefixed 20-byte address')

const STRATEGY_NAMES = ['fixed', 'base_fee_ratio'] as const satisfies readonly PriorityFeeStrategyName[]

const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000'

const EnvSchema = z.object({
  CONTRACTS_CREATE2_FACTORY_ADDR: address.default(ZERO_ADDRESS),
  CONTRACTS_L1_MULTICALL3_ADDR: address.default(ZERO_ADDRESS),
  CONTRACTS_VALIDATOR_TIMELOCK_ADDR: address.default(ZERO_ADDRESS),

  CHAIN_STATE_KEEPER_TRANSACTION_SLOTS: intString.default('250'),
  CHAIN_STATE_KEEPER_MINIBLOCK_COMMIT_DEADLINE_MS: intString.default('1000'),
  CHAIN_STATE_KEEPER_BLOCK_COMMIT_DEADLINE_MS: intString.default('2500'),
  CHAIN_STATE_KEEPER_MAX_GAS_PER_BATCH: bigintString.default('200000000'),
  CHAIN_STATE_KEEPER_MAX_SINGLE_TX_GAS: bigintString.default('6000000'),
  CHAIN_STATE_KEEPER_MAX_ETH_PARAMS_PER_BATCH: bigintString.default('60000'),
  CHAIN_STATE_KEEPER_MAX_GEOMETRY_PER_BATCH: bigintString.default('24100'),
  CHAIN_STATE_KEEPER_MAX_PUBDATA_PER_BATCH: bigintString.default('100000'),
  CHAIN_STATE_KEEPER_MINIMAL_L2_GAS_PRICE: bigintString.default('100000000'),
  CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_GAS_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_REJECT_TX_AT_GAS_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_ETH_PARAMS_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_REJECT_TX_AT_ETH_PARAMS_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_GEOMETRY_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_REJECT_TX_AT_GEOMETRY_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_PUBDATA_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_REJECT_TX_AT_PUBDATA_PERCENTAGE: percentage.default(0.95),
  CHAIN_STATE_KEEPER_PROOF_SENDING_MODE: z.nativeEnum(ProofSendingMode).default(ProofSendingMode.ONLY_REAL_PROOFS),
  CHAIN_STATE_KEEPER_FIRST_BATCH_NUMBER: intString.default('1'),
  API_WEB3_JSON_RPC_MAX_TX_SIZE: bigintString.default('1000000'),

  ETH_SENDER_SENDER_DEFAULT_PRIORITY_FEE_PER_GAS: bigintString.default('1000000000'),
  ETH_SENDER_SENDER_MAX_ACCEPTABLE_PRIORITY_FEE_IN_GWEI: bigintString.default('100'),
  ETH_SENDER_SENDER_MAX_AGGREGATED_TX_GAS: bigintString.default('4000000'),
  ETH_SENDER_SENDER_MAX_ETH_TX_DATA_SIZE: intString.default('120000'),
  ETH_SENDER_SENDER_MAX_AGGREGATED_BLOCKS_TO_EXECUTE: intString.default('10'),
  ETH_SENDER_SENDER_AGGREGATED_BLOCK_COMMIT_DEADLINE: intString.default('1'),
  ETH_SENDER_SENDER_AGGREGATED_BLOCK_PROVE_DEADLINE: intString.default('10'),
  ETH_SENDER_SENDER_AGGREGATED_BLOCK_EXECUTE_DEADLINE: intString.default('10'),
  ETH_SENDER_SENDER_TX_POLL_PERIOD: intString.default('1'),
  ETH_SENDER_SENDER_AGGREGATE_TX_POLL_PERIOD: intString.default('1'),
  ETH_SENDER_SENDER_TX_INCLUSION_TIMEOUT: intString.optional(),
  ETH_SENDER_SENDER_MAX_FEE_BUMPS: intString.default('3'),
  ETH_SENDER_SENDER_MAX_TXS_IN_FLIGHT: intString.default('30'),
  ETH_SENDER_SENDER_WAIT_CONFIRMATIONS: intString.default('1'),
  ETH_SENDER_SENDER_PROOF_LOADING_MODE: z.nativeEnum(ProofLoadingMode).default(ProofLoadingMode.OLD_PROOF_FROM_DB),
  ETH_SENDER_SENDER_OPERATOR_PRIVATE_KEY: z.string().regex(/^(0x)?[0-9a-fA-F]{64}$/, 'expected a 32-byte hex key').optional(),

  ETH_SENDER_GAS_ADJUSTER_MAX_BASE_FEE_SAMPLES: intString.default('100'),
  ETH_SENDER_GAS_ADJUSTER_POLL_PERIOD: intString.default('5'),
  ETH_SENDER_GAS_ADJUSTER_STRATEGY: z.enum(STRATEGY_NAMES).default('base_fee_ratio'),

  ETH_CLIENT_WEB3_URL: z.string().url().default('http://127.0.0.1:8545'),
  ETH_CLIENT_CHAIN_ID: intString.default('9'),
  ETH_CLIENT_USE_LINEA_ESTIMATE_GAS: bool.default('false'),

  PROOF_STORE_URL: z.string().url().optional(),
  LOG_LEVEL: z.string().default('info'),
})

type ParsedEnv = z.infer<typeof EnvSchema>

function thresholdIssues(e: ParsedEnv): string[] {
  const pairs: Array<[string, number, number]> = [
    ['gas', e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_GAS_PERCENTAGE, e.CHAIN_STATE_KEEPER_REJECT_TX_AT_GAS_PERCENTAGE],
    ['eth_params', e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_ETH_PARAMS_PERCENTAGE, e.CHAIN_STATE_KEEPER_REJECT_TX_AT_ETH_PARAMS_PERCENTAGE],
    ['geometry', e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_GEOMETRY_PERCENTAGE, e.CHAIN_STATE_KEEPER_REJECT_TX_AT_GEOMETRY_PERCENTAGE],
    ['pubdata', e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_PUBDATA_PERCENTAGE, e.CHAIN_STATE_KEEPER_REJECT_TX_AT_PUBDATA_PERCENTAGE],
  ]
  const issues: string[] = []
  for (const [name, close, reject] of pairs) {
    if (close > reject) issues.push(`close_block_at_${name}_percentage (${close}) must not exceed reject_tx_at_${name}_percentage (${reject})`)
  }
  if (e.CHAIN_STATE_KEEPER_MAX_SINGLE_TX_GAS > e.CHAIN_STATE_KEEPER_MAX_GAS_PER_BATCH) {
    issues.push('max_single_tx_gas must not exceed max_gas_per_batch')
  }
  if (e.CHAIN_STATE_KEEPER_TRANSACTION_SLOTS < 1) issues.push('transaction_slots must be at least 1')
  if (e.ETH_SENDER_SENDER_MAX_AGGREGATED_BLOCKS_TO_EXECUTE < 1) issues.push('max_aggregated_blocks_to_execute must be at least 1')
  if (e.ETH_SENDER_SENDER_MAX_TXS_IN_FLIGHT < 1) issues.push('max_txs_in_flight must be at least 1')
  if (e.ETH_SENDER_GAS_ADJUSTER_MAX_BASE_FEE_SAMPLES < 1) issues.push('max_base_fee_samples must be at least 1')
  const maxPriority = e.ETH_SENDER_SENDER_MAX_ACCEPTABLE_PRIORITY_FEE_IN_GWEI * GWEI
  if (maxPriority < e.ETH_SENDER_SENDER_DEFAULT_PRIORITY_FEE_PER_GAS) {
    issues.push('max_acceptable_priority_fee_in_gwei must not be below default_priority_fee_per_gas')
  }
  return issues
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const v of Object.values(value)) deepFreeze(v)
    Object.freeze(value)
  }
  return value
}

/**
 * Parse and validate configuration from an env-like record. Throws ConfigurationError listing every issue.
 */
export function loadConfig(source: EnvSource = process.env): PipelineConfig {
  const res = EnvSchema.safeParse(source)
  if (!res.success) {
    const issues = res.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigurationError(reason('CONFIG_INVALID'), issues)
  }
  const e = res.data
  const issues = thresholdIssues(e)
  if (issues.length) throw new ConfigurationError(reason('CONFIG_INVALID'), issues)

  const txPollPeriodMs = e.ETH_SENDER_SENDER_TX_POLL_PERIOD * 1000

  const config: PipelineConfig = {
    contracts: {
      create2FactoryAddr: e.CONTRACTS_CREATE2_FACTORY_ADDR,
      l1Multicall3Addr: e.CONTRACTS_L1_MULTICALL3_ADDR,
      validatorTimelockAddr: e.CONTRACTS_VALIDATOR_TIMELOCK_ADDR,
    },
    stateKeeper: {
      transactionSlots: e.CHAIN_STATE_KEEPER_TRANSACTION_SLOTS,
      miniblockCommitDeadlineMs: e.CHAIN_STATE_KEEPER_MINIBLOCK_COMMIT_DEADLINE_MS,
      blockCommitDeadlineMs: e.CHAIN_STATE_KEEPER_BLOCK_COMMIT_DEADLINE_MS,
      maxGasPerBatch: e.CHAIN_STATE_KEEPER_MAX_GAS_PER_BATCH,
      maxSingleTxGas: e.CHAIN_STATE_KEEPER_MAX_SINGLE_TX_GAS,
      maxEthParamsPerBatch: e.CHAIN_STATE_KEEPER_MAX_ETH_PARAMS_PER_BATCH,
      maxGeometryPerBatch: e.CHAIN_STATE_KEEPER_MAX_GEOMETRY_PER_BATCH,
      maxPubdataPerBatch: e.CHAIN_STATE_KEEPER_MAX_PUBDATA_PER_BATCH,
      maxTxSize: e.API_WEB3_JSON_RPC_MAX_TX_SIZE,
      minimalL2GasPrice: e.CHAIN_STATE_KEEPER_MINIMAL_L2_GAS_PRICE,
      closeBlockAt: {
        [ResourceDimension.GAS]: e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_GAS_PERCENTAGE,
        [ResourceDimension.DATA_SIZE]: e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_ETH_PARAMS_PERCENTAGE,
        [ResourceDimension.GEOMETRY]: e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_GEOMETRY_PERCENTAGE,
        [ResourceDimension.PUBDATA]: e.CHAIN_STATE_KEEPER_CLOSE_BLOCK_AT_PUBDATA_PERCENTAGE,
      },
      rejectTxAt: {
        [ResourceDimension.GAS]: e.CHAIN_STATE_KEEPER_REJECT_TX_AT_GAS_PERCENTAGE,
        [ResourceDimension.DATA_SIZE]: e.CHAIN_STATE_KEEPER_REJECT_TX_AT_ETH_PARAMS_PERCENTAGE,
        [ResourceDimension.GEOMETRY]: e.CHAIN_STATE_KEEPER_REJECT_TX_AT_GEOMETRY_PERCENTAGE,
        [ResourceDimension.PUBDATA]: e.CHAIN_STATE_KEEPER_REJECT_TX_AT_PUBDATA_PERCENTAGE,
      },
      firstBatchNumber: e.CHAIN_STATE_KEEPER_FIRST_BATCH_NUMBER,
    },
    ethSender: {
      maxAggregatedTxGas: e.ETH_SENDER_SENDER_MAX_AGGREGATED_TX_GAS,
      maxEthTxDataSize: e.ETH_SENDER_SENDER_MAX_ETH_TX_DATA_SIZE,
      maxAggregatedBlocksToExecute: e.ETH_SENDER_SENDER_MAX_AGGREGATED_BLOCKS_TO_EXECUTE,
      aggregatedBlockCommitDeadlineMs: e.ETH_SENDER_SENDER_AGGREGATED_BLOCK_COMMIT_DEADLINE * 1000,
      aggregatedBlockProveDeadlineMs: e.ETH_SENDER_SENDER_AGGREGATED_BLOCK_PROVE_DEADLINE * 1000,
      aggregatedBlockExecuteDeadlineMs: e.ETH_SENDER_SENDER_AGGREGATED_BLOCK_EXECUTE_DEADLINE * 1000,
      txPollPeriodMs,
      aggregateTxPollPeriodMs: e.ETH_SENDER_SENDER_AGGREGATE_TX_POLL_PERIOD * 1000,
      // defaults to three poll periods without a receipt
      txInclusionTimeoutMs: e.ETH_SENDER_SENDER_TX_INCLUSION_TIMEOUT !== undefined ? e.ETH_SENDER_SENDER_TX_INCLUSION_TIMEOUT * 1000 : txPollPeriodMs * 3,
      maxFeeBumps: e.ETH_SENDER_SENDER_MAX_FEE_BUMPS,
      maxTxsInFlight: e.ETH_SENDER_SENDER_MAX_TXS_IN_FLIGHT,
      waitConfirmations: e.ETH_SENDER_SENDER_WAIT_CONFIRMATIONS,
      proofSendingMode: e.CHAIN_STATE_KEEPER_PROOF_SENDING_MODE,
      proofLoadingMode: e.ETH_SENDER_SENDER_PROOF_LOADING_MODE,
    },
    gasAdjuster: {
      defaultPriorityFeePerGas: e.ETH_SENDER_SENDER_DEFAULT_PRIORITY_FEE_PER_GAS,
      maxAcceptablePriorityFee: e.ETH_SENDER_SENDER_MAX_ACCEPTABLE_PRIORITY_FEE_IN_GWEI * GWEI,
      maxBaseFeeSamples: e.ETH_SENDER_GAS_ADJUSTER_MAX_BASE_FEE_SAMPLES,
      pollPeriodMs: e.ETH_SENDER_GAS_ADJUSTER_POLL_PERIOD * 1000,
      strategy: e.ETH_SENDER_GAS_ADJUSTER_STRATEGY,
    },
    ethClient: {
      web3Url: e.ETH_CLIENT_WEB3_URL,
      chainId: e.ETH_CLIENT_CHAIN_ID,
      operatorPrivateKey: e.ETH_SENDER_SENDER_OPERATOR_PRIVATE_KEY,
      useLineaEstimateGas: e.ETH_CLIENT_USE_LINEA_ESTIMATE_GAS,
    },
    proofStoreUrl: e.PROOF_STORE_URL,
    logLevel: e.LOG_LEVEL,
  }
  return deepFreeze(config)
}

// env/ sits beside src/; a built copy falls back to the working directory
const packageRoot = path.resolve(__dirname, '..')

/**
 * Load a dotenv file into process.env (existing variables win).
 * SEALKEEPER_ENV_FILE names a file directly; SEALKEEPER_NETWORK picks env/<network>.env from the package root.
 * Returns the path loaded, if any.
 */
export function loadEnvFile(source: EnvSource = process.env): string | undefined {
  const candidates: string[] = []
  if (source.SEALKEEPER_ENV_FILE) candidates.push(path.resolve(source.SEALKEEPER_ENV_FILE))
  if (source.SEALKEEPER_NETWORK) {
    candidates.push(path.join(packageRoot, 'env', `${source.SEALKEEPER_NETWORK}.env`))
    candidates.push(path.join(process.cwd(), 'env', `${source.SEALKEEPER_NETWORK}.env`))
  }
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p })
      return p
    }
  }
  return undefined
}
