/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { sha256 } from '@cosmjs/crypto'
import type { Principal } from '@dfinity/principal'
import { NANOS_PER_SECOND, bytesToHex, utf8ToBytes } from '../agent/base'
import { principalSchema } from '../agent/account'
import {
  Call, CallError, CallRejected, CandidDecodingFailed, CanisterError, RejectCode, SysUnknown
} from '../agent/call'
import { Canister, defineCanister, trap } from '../agent/canister'
import type { CanisterContext } from '../agent/canister'
import { CanisterClient } from '../agent/connec'
import { MANAGEMENT_CANISTER } from '../agent/identity'
import { Err, Ok, resultSchema } from '../agent/result'
import type { Result } from '../agent/result'
import { natSchema } from '../agent/token'
import { SIGN_WITH_ECDSA_FEE, signWithEcdsaReplySchema } from '../agent/management'

/** How long `stubborn_set` keeps retrying. */
export const STUBBORN_SET_TIMEOUT = 10n * 60n * NANOS_PER_SECOND

/** Threshold key available on a local replica. */
export const DEFAULT_ECDSA_KEY = 'dfx_test_key'

/** Calls a counter canister in the ways a canister can call another:
  * ignoring failures, handling every failure, and retrying. */
export class CallerCanister extends Canister {

  constructor (ic: CanisterContext, readonly ecdsaKeyName: string = DEFAULT_ECDSA_KEY) {
    super(ic)
    this.update('call_get_and_set', z.tuple([principalSchema, natSchema]),
      ([counter, value]) => this.callGetAndSet(counter, value))
    this.update('set_then_get', z.tuple([principalSchema, natSchema]),
      ([counter, value]) => this.setThenGet(counter, value))
    this.update('call_increment', z.tuple([principalSchema]),
      ([counter]) => this.callIncrement(counter))
    this.update('stubborn_set', z.tuple([principalSchema, natSchema]),
      ([counter, value]) => this.stubbornSet(counter, value))
    this.update('sign_message', z.tuple([z.string()]),
      ([message]) => this.signMessage(message))
    this.update('increment_twice', z.tuple([principalSchema]),
      ([counter]) => this.incrementTwice(counter))
  }

  /** Set the counter and return its previous value. Traps on any failure. */
  async callGetAndSet (counter: Principal, value: bigint): Promise<bigint> {
    return await Call.unboundedWait(this.ic, counter, 'get_and_set')
      .withArg(value)
      .call(natSchema)
      .catch(bail('Failed to get the old value. Bail out'))
  }

  /** Set the counter, then read it back. Other messages may run between
    * the two calls, so the value read need not be the value that was set. */
  async setThenGet (counter: Principal, value: bigint): Promise<bigint> {
    await Call.unboundedWait(this.ic, counter, 'set')
      .withArg(value)
      .call(z.null())
      .catch(bail('Failed to set the value. Bail out'))
    return await Call.unboundedWait(this.ic, counter, 'get')
      .call(natSchema)
      .catch(bail('Failed to get the current value. Bail out'))
  }

  async callIncrement (counter: Principal): Promise<Result<null>> {
    try {
      await Call.new(this.ic, counter, 'increment').call(z.null())
      return Ok(null)
    } catch (e) {
      if (e instanceof CallRejected) {
        const reason = e.rejectMessage
        switch (e.rejectCode) {
          case RejectCode.SysFatal:
            return Err(`The call was rejected with a fatal error: ${reason}`)
          case RejectCode.SysTransient:
            return Err(e.sync
              ? `The call was rejected with a synchronous transient error: ${reason}`
              : `The call was rejected with an asynchronous transient error: ${reason}`)
          case RejectCode.DestinationInvalid:
            return Err(`The call was rejected because the destination is invalid: ${reason}`)
          case RejectCode.CanisterReject:
            return Err(`The call made it to the canister but was rejected: ${reason}`)
          default:
            return Err(`The call was rejected: ${e.message}`)
        }
      }
      if (e instanceof CandidDecodingFailed) {
        return Err(`The counter canister returned a non-unit response: ${e.reason}`)
      }
      if (e instanceof CanisterError) {
        return Err(`The counter canister returned an error while trying to increment the value: ${e.rejectMessage}`)
      }
      if (e instanceof CallError) {
        return Err(`The outcome of the call is unknown: ${e.message}`)
      }
      throw e
    }
  }

  /** Keep trying to set the counter until it succeeds, the deadline passes,
    * or an error that can't be retried occurs. Safe because `set` is idempotent. */
  async stubbornSet (counter: Principal, value: bigint): Promise<Result<null>> {
    const deadline = this.ic.time() + STUBBORN_SET_TIMEOUT
    while (true) {
      try {
        await Call.boundedWait(this.ic, counter, 'set').withArg(value).call(z.null())
        return Ok(null)
      } catch (e) {
        if (e instanceof CallRejected) {
          if (!e.immediatelyRetryable()) {
            return Err(`Failed to set the value and cannot retry: ${e.message}`)
          }
        } else if (e instanceof CandidDecodingFailed) {
          return Err(`The counter canister returned a non-unit response: ${e.reason}`)
        } else if (e instanceof CanisterError) {
          return Err(`The counter canister returned an error while trying to set the value: ${e.rejectMessage}`)
        } else if (!(e instanceof SysUnknown)) {
          throw e
        }
        if (this.ic.time() > deadline) {
          return Err('Timed out while trying to set the value')
        }
      }
    }
  }

  /** Sign the SHA-256 of a message with the canister's threshold key. */
  async signMessage (message: string): Promise<Result<string>> {
    const request = {
      message_hash:    sha256(utf8ToBytes(message)),
      derivation_path: [],
      key_id:          { curve: { secp256k1: null }, name: this.ecdsaKeyName },
    }
    try {
      const { signature } = await Call.boundedWait(this.ic, MANAGEMENT_CANISTER, 'sign_with_ecdsa')
        .withArg(request)
        .withCycles(SIGN_WITH_ECDSA_FEE)
        .call(signWithEcdsaReplySchema)
      return Ok(bytesToHex(signature))
    } catch (e) {
      if (e instanceof SysUnknown) {
        return Err(`Got a SysUnknown error while signing message: ${e.rejectMessage}; cycles are not refunded`)
      }
      if (e instanceof CallError) {
        return Err(`Error signing message: ${e.message}`)
      }
      throw e
    }
  }

  /** Read the counter, increment it twice, and read it again. */
  async incrementTwice (counter: Principal): Promise<[bigint, bigint]> {
    const initial = await Call.new(this.ic, counter, 'get')
      .call(natSchema)
      .catch(bail('Failed to get the initial value'))
    await Call.new(this.ic, counter, 'inc')
      .call(z.null())
      .catch(bail('Failed to increment the value'))
    await Call.new(this.ic, counter, 'inc')
      .call(z.null())
      .catch(bail('Failed to increment the value'))
    const end = await Call.new(this.ic, counter, 'get')
      .call(natSchema)
      .catch(bail('Failed to get the final value'))
    return [initial, end]
  }
}

function bail (reason: string) {
  return (error: unknown): never => trap(`${reason}: ${(error instanceof Error) ? error.message : String(error)}`)
}

export const Caller = defineCanister('caller',
  z.object({ ecdsa_key_name: z.string() }).partial().optional(),
  (ic, init) => new CallerCanister(ic, init?.ecdsa_key_name))

const textResult = resultSchema(z.null(), z.string())

export class CallerClient extends CanisterClient {
  callGetAndSet (counter: Principal, value: bigint): Promise<bigint> {
    return this.update('call_get_and_set', [counter, value], natSchema)
  }
  setThenGet (counter: Principal, value: bigint): Promise<bigint> {
    return this.update('set_then_get', [counter, value], natSchema)
  }
  callIncrement (counter: Principal): Promise<Result<null>> {
    return this.update('call_increment', [counter], textResult)
  }
  stubbornSet (counter: Principal, value: bigint): Promise<Result<null>> {
    return this.update('stubborn_set', [counter, value], textResult)
  }
  signMessage (message: string): Promise<Result<string>> {
    return this.update('sign_message', [message], resultSchema(z.string(), z.string()))
  }
  incrementTwice (counter: Principal): Promise<[bigint, bigint]> {
    return this.update('increment_twice', [counter], z.tuple([natSchema, natSchema]))
  }
}
