/*
 * Entry point of the sealing node.
 *
 *  1. Load the env profile and validate configuration
 *  2. Build the pipeline over the ethers client
 *  3. Feed executed-transaction measurements from stdin (see ingest.ts)
 *  4. Stop every timer on SIGINT / SIGTERM
 */

import readline from 'readline'
import { ConfigurationError, reason } from '@sealkeeper/reasons'
import { EthersL1Client } from './clients/EthersL1Client'
import { loadConfig, loadEnvFile } from './config'
import { IngestMessage, parseLine } from './ingest'
import { Pipeline } from './pipeline/Pipeline'
import { HttpProofStore } from './services/HttpProofStore'
import { InMemoryProofSource } from './services/ProofGate'
import { LatestStateRootProvider } from './services/SealedBatchStore'
import { getLogger } from './utils/logger'

const log = getLogger('main')

function tryParse(line: string): IngestMessage | undefined {
  try {
    return parseLine(line)
  } catch (err) {
    log.warn({ event: 'ingest.invalid', err: err instanceof Error ? err.message : String(err) })
    return undefined
  }
}

async function start(): Promise<void> {
  const envFile = loadEnvFile()
  const config = loadConfig()
  log.info({ event: 'config.loaded', envFile: envFile ?? null, chainId: config.ethClient.chainId })

  if (!config.ethClient.operatorPrivateKey) {
    throw new ConfigurationError(reason('CONFIG_INVALID'), ['ETH_SENDER_SENDER_OPERATOR_PRIVATE_KEY is required'])
  }

  const client = new EthersL1Client({
    web3Url: config.ethClient.web3Url,
    chainId: config.ethClient.chainId,
    privateKey: config.ethClient.operatorPrivateKey,
    useLineaEstimateGas: config.ethClient.useLineaEstimateGas,
  })
  const stateRoots = new LatestStateRootProvider()
  const proofSource = new InMemoryProofSource()
  const proofStore = config.proofStoreUrl ? new HttpProofStore(config.proofStoreUrl) : undefined

  const pipeline = await Pipeline.create({ config, client, stateRoots, proofSource, proofStore })
  pipeline.sender.on('bundle.failed', () => log.error({ event: 'pipeline.status', ...pipeline.status() }))
  pipeline.start()

  const rl = readline.createInterface({ input: process.stdin, crlfDelay: Infinity })
  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    log.info({ event: 'main.shutdown', signal })
    rl.close()
    pipeline.stop()
    client.destroy()
  }
  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))

  for await (const line of rl) {
    if (!line.trim()) continue
    const msg = tryParse(line)
    if (!msg) continue
    switch (msg.type) {
      case 'stateRoot':
        stateRoots.update(msg.root)
        break
      case 'proof':
        proofSource.report(msg.batchNumber, msg.proof)
        break
      case 'tx': {
        const res = await pipeline.submit(msg.cost)
        if (res.kind === 'rejected') process.stdout.write(JSON.stringify({ txHash: msg.cost.txHash, rejected: res.error.code }) + '\n')
        break
      }
    }
  }
  shutdown('stdin closed')
}

start().catch(err => {
  log.fatal({ event: 'main.failed', err: err instanceof Error ? err.message : String(err) })
  process.exitCode = 1
})
