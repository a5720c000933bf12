/**
 * Single backing asset held in host storage, so balance moves roll back with
 * the contract transaction that made them.
 */

import type { Address } from 'viem'
import type { ContractStorage } from './storage'
import { accountKey } from './storage'
import type { LedgerHost } from './host'
import { fail } from './errors'

export function balanceOf(storage: ContractStorage, account: Address): bigint {
  return storage.balances.get(accountKey(account)) ?? 0n
}

export function transfer(storage: ContractStorage, from: Address, to: Address, amount: bigint): void {
  if (amount <= 0n) {
    fail('InvalidAmount', `transfer amount must be positive, got ${amount}`)
  }
  const available = balanceOf(storage, from)
  if (available < amount) {
    fail('InsufficientBalance', `${from} holds ${available}, needs ${amount}`)
  }
  storage.balances.set(accountKey(from), available - amount)
  storage.balances.set(accountKey(to), balanceOf(storage, to) + amount)
}

/** Faucet for local networks and tests */
export class AssetLedger {
  constructor(private readonly host: LedgerHost) {}

  mint(to: Address, amount: bigint): bigint {
    return this.host.transact(({ storage }) => {
      if (amount <= 0n) fail('InvalidAmount', `mint amount must be positive, got ${amount}`)
      const next = balanceOf(storage, to) + amount
      storage.balances.set(accountKey(to), next)
      return next
    })
  }

  balanceOf(account: Address): bigint {
    return balanceOf(this.host.storage, account)
  }
}
