import { ErrorAction, ErrorClassifier } from '../../src/services/ErrorClassifier'

function rpcError(message: string, code: number): Error {
  return Object.assign(new Error('could not coalesce error'), { error: { code, message } })
}

describe('ErrorClassifier', () => {
  test.each([
    ['already known', ErrorAction.ACCEPT_SUCCESS],
    ['known transaction: 0xabc', ErrorAction.ACCEPT_SUCCESS],
    ['replacement transaction underpriced', ErrorAction.BUMP_FEE_RETRY],
    ['max fee per gas less than block base fee: fee too low', ErrorAction.BUMP_FEE_RETRY],
    ['nonce too low', ErrorAction.REFRESH_NONCE_RESCHEDULE],
    ['nonce has already been used', ErrorAction.REFRESH_NONCE_RESCHEDULE],
    ['insufficient funds for gas * price + value', ErrorAction.HARD_FAIL],
    ['request timeout', ErrorAction.BACKOFF_RETRY],
    ['connect ECONNREFUSED 127.0.0.1:8545', ErrorAction.BACKOFF_RETRY],
    ['execution reverted', ErrorAction.HARD_FAIL],
  ])('%s -> %s', (message, action) => {
    expect(ErrorClassifier.classifyError(new Error(message)).action).toBe(action)
  })

  test('reads the nested JSON-RPC message', () => {
    const c = ErrorClassifier.classifyError(rpcError('Replacement transaction underpriced', -32000))
    expect(c.action).toBe(ErrorAction.BUMP_FEE_RETRY)
  })

  test('transient server codes back off', () => {
    expect(ErrorClassifier.classifyError(rpcError('limit exceeded', -32005))).toEqual({
      action: ErrorAction.BACKOFF_RETRY,
      reason: 'Network or timeout issue',
      code: 'NETWORK_RPC_UNAVAILABLE',
    })
    expect(ErrorClassifier.classifyError(rpcError('header not found', -32000))).toEqual({
      action: ErrorAction.BACKOFF_RETRY,
      reason: 'RPC error -32000',
      code: 'NETWORK_RPC_UNAVAILABLE',
    })
  })

  test('anything else is a hard failure', () => {
    expect(ErrorClassifier.classifyError('boom')).toEqual({ action: ErrorAction.HARD_FAIL, reason: 'Unknown transaction error', code: 'SUBMIT_REJECTED' })
  })
})
