/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { NANOS_PER_SECOND, bold, bytesToHex } from '../agent/base'
import type { Nanos } from '../agent/base'
import {
  AccountIdentifier, Subaccount, accountIdentifierOf, accountSchema, blobSchema, principalSchema
} from '../agent/account'
import type { Account } from '../agent/account'
import { opt } from '../agent/candid'
import { Canister, defineCanister, noArgs, trap } from '../agent/canister'
import type { CanisterContext, IncomingMessage } from '../agent/canister'
import { CanisterClient } from '../agent/connec'
import { resultSchema } from '../agent/result'
import type { Result } from '../agent/result'
import { DEFAULT_TRANSFER_FEE, MAX_E8S, nat64Schema, natSchema, tokensSchema } from '../agent/token'
import type { Tokens } from '../agent/token'

/** Transactions can't be older than this. */
export const TRANSACTION_WINDOW = 24n * 60n * 60n * NANOS_PER_SECOND

/** How far ahead of the ledger's clock a transaction can be created. */
export const PERMITTED_DRIFT = 60n * NANOS_PER_SECOND

export const ledgerInitSchema = z.object({
  Init: z.object({
    minting_account: z.string(),
    initial_values:  z.array(z.tuple([z.string(), tokensSchema])),
    send_whitelist:  z.array(principalSchema),
    transfer_fee:    opt(tokensSchema),
    token_symbol:    opt(z.string()),
    token_name:      opt(z.string()),
  })
})

export type LedgerInit = z.infer<typeof ledgerInitSchema>['Init']

export const transferArgsSchema = z.object({
  memo:            nat64Schema,
  amount:          tokensSchema,
  fee:             tokensSchema,
  from_subaccount: opt(blobSchema),
  to:              blobSchema,
  created_at_time: opt(z.object({ timestamp_nanos: nat64Schema })),
})

export type TransferArgs = z.infer<typeof transferArgsSchema>

export const transferErrorSchema = z.union([
  z.object({ BadFee:            z.object({ expected_fee: tokensSchema }) }),
  z.object({ InsufficientFunds: z.object({ balance: tokensSchema }) }),
  z.object({ TxTooOld:          z.object({ allowed_window_nanos: nat64Schema }) }),
  z.object({ TxCreatedInFuture: z.null() }),
  z.object({ TxDuplicate:       z.object({ duplicate_of: nat64Schema }) }),
])

export type TransferError = z.infer<typeof transferErrorSchema>

export const transferResultSchema = resultSchema(nat64Schema, transferErrorSchema)

export const icrc1TransferArgSchema = z.object({
  from_subaccount: opt(blobSchema),
  to:              accountSchema,
  fee:             opt(natSchema),
  created_at_time: opt(nat64Schema),
  memo:            opt(blobSchema),
  amount:          natSchema,
})

export type Icrc1TransferArg = z.infer<typeof icrc1TransferArgSchema>

export const icrc1TransferErrorSchema = z.union([
  z.object({ BadFee:                 z.object({ expected_fee: natSchema }) }),
  z.object({ BadBurn:                z.object({ min_burn_amount: natSchema }) }),
  z.object({ InsufficientFunds:      z.object({ balance: natSchema }) }),
  z.object({ TooOld:                 z.null() }),
  z.object({ CreatedInFuture:        z.object({ ledger_time: nat64Schema }) }),
  z.object({ Duplicate:              z.object({ duplicate_of: natSchema }) }),
  z.object({ TemporarilyUnavailable: z.null() }),
  z.object({ GenericError:           z.object({ error_code: natSchema, message: z.string() }) }),
])

export type Icrc1TransferError = z.infer<typeof icrc1TransferErrorSchema>

export const icrc1TransferResultSchema = resultSchema(natSchema, icrc1TransferErrorSchema)

export type Operation =
  | { Mint:     { to: string, amount: bigint } }
  | { Burn:     { from: string, amount: bigint } }
  | { Transfer: { from: string, to: string, amount: bigint, fee: bigint } }

export interface Block {
  timestamp:      Nanos
  operation:      Operation
  memo:           bigint
  icrc1Memo?:     Uint8Array
  createdAtTime?: Nanos
}

/** A transfer in the form shared by both interfaces. */
interface PendingTransfer {
  from:           AccountIdentifier
  to:             AccountIdentifier
  amount:         bigint
  /** Fee the sender expects to pay, if stated. */
  fee?:           bigint
  memo:           bigint
  icrc1Memo?:     Uint8Array
  createdAtTime?: Nanos
}

type TransferFailure =
  | { kind: 'BadFee', expectedFee: bigint }
  | { kind: 'BadBurn', minBurnAmount: bigint }
  | { kind: 'InsufficientFunds', balance: bigint }
  | { kind: 'TooOld' }
  | { kind: 'CreatedInFuture', ledgerTime: Nanos }
  | { kind: 'Duplicate', duplicateOf: bigint }
  | { kind: 'SupplyOverflow', message: string }

/** ICP ledger with the ICRC-1 interface. Balances are keyed by account identifier. */
export class LedgerCanister extends Canister {
  balances    = new Map<string, bigint>()
  blocks:     Block[] = []
  totalSupply = 0n
  /** Recent transactions that stated their creation time, for deduplication. */
  recent      = new Map<string, { index: bigint, createdAtTime: Nanos }>()

  mintingAccount: AccountIdentifier
  fee:            bigint
  symbol:         string
  name:           string
  decimals =      8

  constructor (ic: CanisterContext, init: LedgerInit) {
    super(ic)
    this.mintingAccount = AccountIdentifier.fromHex(init.minting_account)
    this.fee    = (init.transfer_fee[0] ?? DEFAULT_TRANSFER_FEE).e8s
    this.symbol = init.token_symbol[0] ?? 'ICP'
    this.name   = init.token_name[0] ?? 'Internet Computer'
    for (const [address, { e8s }] of init.initial_values) {
      const to = AccountIdentifier.fromHex(address)
      if (this.totalSupply + e8s > MAX_E8S) {
        trap(`Initial values exceed the maximum total supply of ${MAX_E8S} e8s`)
      }
      this.credit(to, e8s)
      this.totalSupply += e8s
      this.push({ Mint: { to: to.toHex(), amount: e8s } }, 0n)
    }
    this.exportLegacy()
    this.exportIcrc1()
  }

  private exportLegacy () {
    this.update('transfer', z.tuple([transferArgsSchema]),
      ([args], message) => this.transfer(args, message))
    this.query('account_balance', z.tuple([z.object({ account: blobSchema })]),
      ([{ account }]) => ({ e8s: this.balanceOf(parseAccountId(account)) }))
    this.query('transfer_fee', z.tuple([z.object({})]),
      () => ({ transfer_fee: { e8s: this.fee } }))
    this.query('symbol', noArgs, () => ({ symbol: this.symbol }))
    this.query('name', noArgs, () => ({ name: this.name }))
    this.query('decimals', noArgs, () => ({ decimals: this.decimals }))
  }

  private exportIcrc1 () {
    this.query('icrc1_name', noArgs, () => this.name)
    this.query('icrc1_symbol', noArgs, () => this.symbol)
    this.query('icrc1_decimals', noArgs, () => this.decimals)
    this.query('icrc1_fee', noArgs, () => this.fee)
    this.query('icrc1_total_supply', noArgs, () => this.totalSupply)
    this.query('icrc1_minting_account', noArgs, () => [])
    this.query('icrc1_metadata', noArgs, () => [
      ['icrc1:decimals', { Nat: BigInt(this.decimals) }],
      ['icrc1:name',     { Text: this.name }],
      ['icrc1:symbol',   { Text: this.symbol }],
      ['icrc1:fee',      { Nat: this.fee }],
    ])
    this.query('icrc1_supported_standards', noArgs, () => [
      { name: 'ICRC-1', url: 'https://github.com/dfinity/ICRC-1' }
    ])
    this.query('icrc1_balance_of', z.tuple([accountSchema]),
      ([account]) => this.balanceOf(icrcAccountId(account)))
    this.update('icrc1_transfer', z.tuple([icrc1TransferArgSchema]),
      ([arg], message) => this.icrc1Transfer(arg, message))
  }

  balanceOf (account: AccountIdentifier): bigint {
    return this.balances.get(account.toHex()) ?? 0n
  }

  transfer (args: TransferArgs, message: IncomingMessage): Result<bigint, TransferError> {
    const result = this.apply({
      from:          AccountIdentifier.fromPrincipal(message.caller, subaccountOf(args.from_subaccount)),
      to:            parseAccountId(args.to),
      amount:        args.amount.e8s,
      fee:           args.fee.e8s,
      memo:          args.memo,
      createdAtTime: args.created_at_time[0]?.timestamp_nanos,
    })
    if ('Ok' in result) return result
    const failure = result.Err
    switch (failure.kind) {
      case 'BadFee':
        return { Err: { BadFee: { expected_fee: { e8s: failure.expectedFee } } } }
      case 'InsufficientFunds':
        return { Err: { InsufficientFunds: { balance: { e8s: failure.balance } } } }
      case 'TooOld':
        return { Err: { TxTooOld: { allowed_window_nanos: TRANSACTION_WINDOW } } }
      case 'CreatedInFuture':
        return { Err: { TxCreatedInFuture: null } }
      case 'Duplicate':
        return { Err: { TxDuplicate: { duplicate_of: failure.duplicateOf } } }
      case 'BadBurn':
        return trap(`Burns lower than ${failure.minBurnAmount} e8s are not allowed`)
      case 'SupplyOverflow':
        return trap(failure.message)
    }
  }

  icrc1Transfer (arg: Icrc1TransferArg, message: IncomingMessage): Result<bigint, Icrc1TransferError> {
    if (arg.amount > MAX_E8S) {
      return { Err: { GenericError: { error_code: 0n, message: `Amount ${arg.amount} exceeds the maximum ${MAX_E8S}` } } }
    }
    const result = this.apply({
      from:          AccountIdentifier.fromPrincipal(message.caller, subaccountOf(arg.from_subaccount)),
      to:            icrcAccountId(arg.to),
      amount:        arg.amount,
      fee:           arg.fee[0],
      memo:          0n,
      icrc1Memo:     arg.memo[0],
      createdAtTime: arg.created_at_time[0],
    })
    if ('Ok' in result) return result
    const failure = result.Err
    switch (failure.kind) {
      case 'BadFee':
        return { Err: { BadFee: { expected_fee: failure.expectedFee } } }
      case 'BadBurn':
        return { Err: { BadBurn: { min_burn_amount: failure.minBurnAmount } } }
      case 'InsufficientFunds':
        return { Err: { InsufficientFunds: { balance: failure.balance } } }
      case 'TooOld':
        return { Err: { TooOld: null } }
      case 'CreatedInFuture':
        return { Err: { CreatedInFuture: { ledger_time: failure.ledgerTime } } }
      case 'Duplicate':
        return { Err: { Duplicate: { duplicate_of: failure.duplicateOf } } }
      case 'SupplyOverflow':
        return { Err: { GenericError: { error_code: 0n, message: failure.message } } }
    }
  }

  /** Validate a transfer and record it as a block. */
  private apply (tx: PendingTransfer): Result<bigint, TransferFailure> {
    const now = this.ic.time()
    this.prune(now)
    const key = dedupKey(tx)
    if (tx.createdAtTime !== undefined) {
      if (tx.createdAtTime + TRANSACTION_WINDOW + PERMITTED_DRIFT < now) {
        return { Err: { kind: 'TooOld' } }
      }
      if (tx.createdAtTime > now + PERMITTED_DRIFT) {
        return { Err: { kind: 'CreatedInFuture', ledgerTime: now } }
      }
      const duplicate = this.recent.get(key)
      if (duplicate) {
        return { Err: { kind: 'Duplicate', duplicateOf: duplicate.index } }
      }
    }
    let operation: Operation
    let fee = 0n
    if (tx.from.equals(this.mintingAccount)) {
      if (tx.fee !== undefined && tx.fee !== 0n) {
        return { Err: { kind: 'BadFee', expectedFee: 0n } }
      }
      // Every balance is bounded by the total supply.
      if (this.totalSupply + tx.amount > MAX_E8S) {
        return { Err: { kind: 'SupplyOverflow',
          message: `Minting ${tx.amount} e8s would exceed the maximum total supply of ${MAX_E8S} e8s` } }
      }
      this.credit(tx.to, tx.amount)
      this.totalSupply += tx.amount
      operation = { Mint: { to: tx.to.toHex(), amount: tx.amount } }
    } else if (tx.to.equals(this.mintingAccount)) {
      if (tx.fee !== undefined && tx.fee !== 0n) {
        return { Err: { kind: 'BadFee', expectedFee: 0n } }
      }
      if (tx.amount < this.fee) {
        return { Err: { kind: 'BadBurn', minBurnAmount: this.fee } }
      }
      const balance = this.balanceOf(tx.from)
      if (balance < tx.amount) {
        return { Err: { kind: 'InsufficientFunds', balance } }
      }
      this.debit(tx.from, tx.amount)
      this.totalSupply -= tx.amount
      operation = { Burn: { from: tx.from.toHex(), amount: tx.amount } }
    } else {
      fee = tx.fee ?? this.fee
      if (fee !== this.fee) {
        return { Err: { kind: 'BadFee', expectedFee: this.fee } }
      }
      const balance = this.balanceOf(tx.from)
      if (balance < tx.amount + fee) {
        return { Err: { kind: 'InsufficientFunds', balance } }
      }
      this.debit(tx.from, tx.amount + fee)
      this.credit(tx.to, tx.amount)
      this.totalSupply -= fee
      operation = { Transfer: { from: tx.from.toHex(), to: tx.to.toHex(), amount: tx.amount, fee } }
    }
    const index = this.push(operation, tx.memo, tx.icrc1Memo, tx.createdAtTime)
    if (tx.createdAtTime !== undefined) {
      this.recent.set(key, { index, createdAtTime: tx.createdAtTime })
    }
    this.log.debug(`Block ${bold(String(index))}:`, Object.keys(operation)[0], String(tx.amount))
    return { Ok: index }
  }

  private push (operation: Operation, memo: bigint, icrc1Memo?: Uint8Array, createdAtTime?: Nanos): bigint {
    this.blocks.push({ timestamp: this.ic.time(), operation, memo, icrc1Memo, createdAtTime })
    return BigInt(this.blocks.length - 1)
  }

  private prune (now: Nanos) {
    for (const [key, { createdAtTime }] of this.recent) {
      if (createdAtTime + TRANSACTION_WINDOW + PERMITTED_DRIFT < now) this.recent.delete(key)
    }
  }

  private credit (account: AccountIdentifier, amount: bigint) {
    this.balances.set(account.toHex(), this.balanceOf(account) + amount)
  }

  private debit (account: AccountIdentifier, amount: bigint) {
    const remaining = this.balanceOf(account) - amount
    if (remaining === 0n) {
      this.balances.delete(account.toHex())
    } else {
      this.balances.set(account.toHex(), remaining)
    }
  }
}

function subaccountOf (subaccount: [] | [Uint8Array]): Subaccount {
  const [bytes] = subaccount
  if (!bytes) return Subaccount.ZERO
  if (bytes.length !== 32) trap(`Invalid subaccount length: ${bytes.length}`)
  return Subaccount.fromBytes(bytes)
}

function icrcAccountId (account: Account): AccountIdentifier {
  subaccountOf(account.subaccount)
  return accountIdentifierOf(account)
}

function parseAccountId (bytes: Uint8Array): AccountIdentifier {
  try {
    return AccountIdentifier.fromBytes(bytes)
  } catch (e) {
    return trap((e instanceof Error) ? e.message : String(e))
  }
}

function dedupKey (tx: PendingTransfer): string {
  return [
    tx.from.toHex(), tx.to.toHex(), tx.amount, tx.fee ?? '', tx.memo,
    tx.icrc1Memo ? bytesToHex(tx.icrc1Memo) : '', tx.createdAtTime ?? ''
  ].join('|')
}

export const Ledger = defineCanister('icp_ledger', ledgerInitSchema,
  (ic, init) => new LedgerCanister(ic, init.Init))

/** Arguments of a legacy ICP transfer. */
export function transferArgs (options: {
  to: AccountIdentifier, amount: Tokens, fee?: Tokens, memo?: bigint,
  fromSubaccount?: Uint8Array, createdAtTime?: Nanos
}): TransferArgs {
  return {
    memo:            options.memo ?? 0n,
    amount:          options.amount,
    fee:             options.fee ?? DEFAULT_TRANSFER_FEE,
    from_subaccount: options.fromSubaccount ? [options.fromSubaccount] : [],
    to:              options.to.bytes,
    created_at_time: (options.createdAtTime !== undefined) ? [{ timestamp_nanos: options.createdAtTime }] : [],
  }
}

export class LedgerClient extends CanisterClient {
  transfer (args: TransferArgs): Promise<Result<bigint, TransferError>> {
    return this.update('transfer', [args], transferResultSchema)
  }
  async accountBalance (account: AccountIdentifier): Promise<Tokens> {
    return this.query('account_balance', [{ account: account.bytes }], tokensSchema)
  }
  async transferFee (): Promise<Tokens> {
    const { transfer_fee } = await this.query('transfer_fee', [{}], z.object({ transfer_fee: tokensSchema }))
    return transfer_fee
  }
  icrc1Fee (): Promise<bigint> {
    return this.query('icrc1_fee', [], natSchema)
  }
  icrc1Symbol (): Promise<string> {
    return this.query('icrc1_symbol', [], z.string())
  }
  icrc1Name (): Promise<string> {
    return this.query('icrc1_name', [], z.string())
  }
  icrc1Decimals (): Promise<number> {
    return this.query('icrc1_decimals', [], z.number().int())
  }
  icrc1TotalSupply (): Promise<bigint> {
    return this.query('icrc1_total_supply', [], natSchema)
  }
  icrc1BalanceOf (account: Account): Promise<bigint> {
    return this.query('icrc1_balance_of', [account], natSchema)
  }
  icrc1Transfer (arg: Icrc1TransferArg): Promise<Result<bigint, Icrc1TransferError>> {
    return this.update('icrc1_transfer', [arg], icrc1TransferResultSchema)
  }
}
