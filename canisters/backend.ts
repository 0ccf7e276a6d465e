/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import type { Principal } from '@dfinity/principal'
import { NANOS_PER_SECOND, describe } from '../agent/base'
import type { Nanos } from '../agent/base'
import { accountOf, accountSchema, blobSchema, principalSchema } from '../agent/account'
import type { Account } from '../agent/account'
import {
  Call, CallError, CallRejected, CandidDecodingFailed, CanisterError, SysUnknown
} from '../agent/call'
import { Canister, defineCanister, trap } from '../agent/canister'
import type { CanisterContext, IncomingMessage } from '../agent/canister'
import { CanisterClient } from '../agent/connec'
import { parsePrincipal } from '../agent/identity'
import { Err, Ok, resultSchema } from '../agent/result'
import type { Result } from '../agent/result'
import { DEFAULT_TRANSFER_FEE, natSchema, tokensSchema } from '../agent/token'
import type { Tokens } from '../agent/token'
import { icrc1TransferResultSchema, transferResultSchema } from './ledger'
import type { Icrc1TransferArg, TransferArgs } from './ledger'
import { XRC_FEE, assetSchema, getExchangeRateResultSchema } from './xrc'
import type { Asset } from './xrc'

/** The only principal allowed to move the canister's ICP, unless configured otherwise. */
export const DEFAULT_OWNER = 'gl542-2r2m3-znmmo-cjhz7-p332z-mbe6x-hmrnu-rv37c-mncas-i46u2-sqe'

/** Id of the ICP ledger on mainnet and on a local replica set up by `ops/setup`. */
export const ICP_LEDGER_CANISTER_ID = 'ryjl3-tyaaa-aaaaa-aaaba-cai'

/** Id of the exchange rate canister on mainnet. */
export const XRC_CANISTER_ID = 'uf6dk-hyaaa-aaaaq-qaaaq-cai'

/** How long calls that are safe to repeat are retried. */
export const RETRY_TIMEOUT = 10n * 60n * NANOS_PER_SECOND

export const accountIdBytesSchema = blobSchema.refine(bytes => bytes.length === 32, {
  message: 'account identifier must be 32 bytes'
})

export interface BackendOptions {
  owner:  Principal
  ledger: Principal
  xrc:    Principal
}

/** Moves tokens held by the canister and looks up exchange rates. */
export class BackendCanister extends Canister {

  constructor (ic: CanisterContext, readonly options: BackendOptions) {
    super(ic)
    this.update('icp_transfer', z.tuple([accountIdBytesSchema, tokensSchema]),
      ([to, amount], message) => this.icpTransfer(to, amount, message))
    this.update('icrc1_get_balance', z.tuple([principalSchema]),
      ([owner]) => this.icrc1GetBalance(owner))
    this.update('icrc1_get_fee', z.tuple([principalSchema]),
      ([ledger]) => this.icrc1GetFee(ledger))
    this.update('icrc1_transfer', z.tuple([principalSchema, accountSchema, natSchema]),
      ([ledger, to, amount]) => this.icrc1Transfer(ledger, to, amount))
    this.update('get_exchange_rate', z.tuple([assetSchema, assetSchema]),
      ([base, quote]) => this.getExchangeRate(base, quote))
  }

  /** Send ICP from the canister's default account. Only the owner may ask. */
  async icpTransfer (to: Uint8Array, amount: Tokens, message: IncomingMessage): Promise<Result<null>> {
    if (message.caller.toText() !== this.options.owner.toText()) {
      return Err('Only the owner can ask to transfer ICP')
    }
    const args: TransferArgs = {
      memo:            0n,
      to,
      amount,
      fee:             DEFAULT_TRANSFER_FEE,
      from_subaccount: [],
      created_at_time: [],
    }
    let result: Result<bigint, unknown>
    try {
      result = await Call.unboundedWait(this.ic, this.options.ledger, 'transfer')
        .withArg(args)
        .call(transferResultSchema)
    } catch (e) {
      if (e instanceof CallRejected) {
        return Err(`Error calling ledger canister: ${e.message}`)
      }
      if (e instanceof CandidDecodingFailed) {
        return trap(`Decoding failed: ${e.reason}`)
      }
      if (e instanceof CanisterError) {
        return trap(`Ledger crashed: ${e.rejectMessage}`)
      }
      if (e instanceof SysUnknown) {
        return trap(`SysUnknown can't happen with unbounded-wait calls: ${e.rejectMessage}`)
      }
      throw e
    }
    if ('Err' in result) {
      return Err(`Ledger returned an error: ${describe(result.Err)}`)
    }
    return Ok(null)
  }

  /** Balance of the default ICRC-1 account of a principal on the ICP ledger. */
  icrc1GetBalance (owner: Principal): Promise<Result<bigint>> {
    const deadline = this.ic.time() + RETRY_TIMEOUT
    return this.retrying(deadline, 'the balance', () =>
      Call.boundedWait(this.ic, this.options.ledger, 'icrc1_balance_of')
        .withArg(accountOf(owner))
        .call(natSchema))
  }

  /** Fee that a ledger charges for a transfer. */
  icrc1GetFee (ledger: Principal): Promise<Result<bigint>> {
    const deadline = this.ic.time() + RETRY_TIMEOUT
    return this.retrying(deadline, 'the fee', () =>
      Call.boundedWait(this.ic, ledger, 'icrc1_fee').call(natSchema))
  }

  /** Transfer tokens from the canister's default account.
    * Setting `created_at_time` makes the ledger deduplicate retries. */
  async icrc1Transfer (ledger: Principal, to: Account, amount: bigint): Promise<Result<null>> {
    let fee: bigint
    try {
      const reply = await Call.boundedWait(this.ic, this.ic.self, 'icrc1_get_fee')
        .withArg(ledger)
        .call(resultSchema(natSchema, z.string()))
      if ('Err' in reply) {
        return Err(`Error obtaining the fee from the ledger canister: ${reply.Err}`)
      }
      fee = reply.Ok
    } catch (e) {
      if (e instanceof CallError) {
        return Err(`Error obtaining the fee from the ledger canister: ${e.message}`)
      }
      throw e
    }
    const arg: Icrc1TransferArg = {
      from_subaccount: [],
      to,
      fee:             [fee],
      created_at_time: [this.ic.time()],
      memo:            [],
      amount,
    }
    const deadline = this.ic.time() + RETRY_TIMEOUT
    let attempts = 0
    const outcome = await this.retrying(deadline, 'the ledger response', () => {
      attempts++
      return Call.boundedWait(this.ic, ledger, 'icrc1_transfer')
        .withArg(arg)
        .call(icrc1TransferResultSchema)
    })
    if ('Err' in outcome) {
      return outcome
    }
    const reply = outcome.Ok
    if ('Ok' in reply) {
      return Ok(null)
    }
    // An earlier attempt went through but its reply was lost.
    if ('Duplicate' in reply.Err && attempts > 1) {
      return Ok(null)
    }
    return Err(`Ledger returned an error: ${describe(reply.Err)}`)
  }

  /** Rate between two assets, and the number of decimals in it. */
  async getExchangeRate (base: Asset, quote: Asset): Promise<Result<[bigint, number]>> {
    try {
      const reply = await Call.boundedWait(this.ic, this.options.xrc, 'get_exchange_rate')
        .withArg({ base_asset: base, quote_asset: quote, timestamp: [] })
        .withCycles(XRC_FEE)
        .call(getExchangeRateResultSchema)
      if ('Err' in reply) {
        return Err(`XRC returned an error: ${describe(reply.Err)}`)
      }
      const rate: [bigint, number] = [reply.Ok.rate, reply.Ok.metadata.decimals]
      return Ok(rate)
    } catch (e) {
      if (e instanceof CallError) {
        return Err(`Error calling XRC: ${e.message}`)
      }
      throw e
    }
  }

  /** Repeat a bounded-wait call to a ledger while it fails
    * in ways after which it's safe to try again. */
  private async retrying <T> (
    deadline: Nanos, subject: string, attempt: () => Promise<T>
  ): Promise<Result<T>> {
    while (true) {
      try {
        return Ok(await attempt())
      } catch (e) {
        if (e instanceof CallRejected) {
          if (!e.immediatelyRetryable()) {
            return Err(`Irrecoverable error: ${e.message}`)
          }
        } else if (e instanceof CandidDecodingFailed) {
          return Err(`Unable to decode ${subject}: ${e.reason}`)
        } else if (e instanceof CanisterError) {
          return Err(`Ledger crashed: ${e.rejectMessage}`)
        } else if (!(e instanceof SysUnknown)) {
          throw e
        }
        if (this.ic.time() > deadline) {
          return Err(`Timed out while waiting for ${subject}`)
        }
      }
    }
  }
}

export const backendInitSchema = z.object({
  owner:  principalSchema,
  ledger: principalSchema,
  xrc:    principalSchema,
}).partial().optional()

export const Backend = defineCanister('backend', backendInitSchema,
  (ic, init) => new BackendCanister(ic, {
    owner:  init?.owner  ?? parsePrincipal(DEFAULT_OWNER),
    ledger: init?.ledger ?? parsePrincipal(ICP_LEDGER_CANISTER_ID),
    xrc:    init?.xrc    ?? parsePrincipal(XRC_CANISTER_ID),
  }))

const textResult = resultSchema(z.null(), z.string())

export class BackendClient extends CanisterClient {
  icpTransfer (to: Uint8Array, amount: Tokens): Promise<Result<null>> {
    return this.update('icp_transfer', [to, amount], textResult)
  }
  icrc1GetBalance (owner: Principal): Promise<Result<bigint>> {
    return this.update('icrc1_get_balance', [owner], resultSchema(natSchema, z.string()))
  }
  icrc1GetFee (ledger: Principal): Promise<Result<bigint>> {
    return this.update('icrc1_get_fee', [ledger], resultSchema(natSchema, z.string()))
  }
  icrc1Transfer (ledger: Principal, to: Account, amount: bigint): Promise<Result<null>> {
    return this.update('icrc1_transfer', [ledger, to, amount], textResult)
  }
  getExchangeRate (base: Asset, quote: Asset): Promise<Result<[bigint, number]>> {
    return this.update('get_exchange_rate', [base, quote],
      resultSchema(z.tuple([natSchema, z.number().int()]), z.string()))
  }
}
