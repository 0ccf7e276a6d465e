/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { z } from 'zod'
import type { Principal } from '@dfinity/principal'
import IccError from './AgentError'
import type { Cycles, Method } from './base'

/** How a caller waits for the reply to a call. */
export type WaitMode =
  /** The call may take arbitrarily long, and its outcome is always learned. */
  | 'unbounded'
  /** The call may time out, in which case the outcome is unknown. */
  | 'bounded'

/** Reject codes of the Internet Computer. */
export enum RejectCode {
  SysFatal           = 1,
  SysTransient       = 2,
  DestinationInvalid = 3,
  CanisterReject     = 4,
  CanisterError      = 5,
  SysUnknown         = 6,
}

/** A call as handed to the system. */
export interface CallRequest {
  callee:  Principal
  method:  Method
  args:    unknown[]
  cycles:  Cycles
  wait:    WaitMode
  /** Only meaningful for bounded-wait calls. */
  timeoutSeconds: number
}

/** Delivers calls made by a canister. */
export interface CallRouter {
  route (request: CallRequest): Promise<unknown>
}

/** Checks the shape of a reply. */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>

/** Base class of the ways a call can fail. */
export abstract class CallError extends IccError {}

/** The call was rejected and definitely had no effect on the callee,
  * unless the callee itself rejected it after doing some work. */
export class CallRejected extends CallError {
  constructor (
    readonly rejectCode:    RejectCode,
    readonly rejectMessage: string,
    /** Whether the system refused the call before it left the caller. */
    readonly sync:          boolean = false,
  ) {
    super(`${RejectCode[rejectCode] ?? `RejectCode(${rejectCode})`}${sync ? ' (sync)' : ''}: ${rejectMessage}`)
  }
  /** Transient rejects that weren't raised synchronously
    * are worth retrying right away. */
  immediatelyRetryable (): boolean {
    return this.rejectCode === RejectCode.SysTransient && !this.sync
  }
}

/** The call may or may not have taken effect. */
export abstract class OutcomeUnknown extends CallError {}

/** The callee replied, but the reply didn't have the expected shape. */
export class CandidDecodingFailed extends OutcomeUnknown {
  constructor (readonly reason: string, readonly reply: unknown) {
    super(`Failed to decode the reply: ${reason}`)
  }
}

/** The callee trapped or couldn't run the method. */
export class CanisterError extends OutcomeUnknown {
  readonly rejectCode = RejectCode.CanisterError
  constructor (readonly rejectMessage: string) {
    super(`CanisterError: ${rejectMessage}`)
  }
}

/** A bounded-wait call timed out or its reply was lost. */
export class SysUnknown extends OutcomeUnknown {
  readonly rejectCode = RejectCode.SysUnknown
  constructor (readonly rejectMessage: string) {
    super(`SysUnknown: ${rejectMessage}`)
  }
}

/** Builder for calls to other canisters. */
export class Call {

  /** Timeout of bounded-wait calls unless set otherwise. */
  static readonly DEFAULT_TIMEOUT_SECONDS = 300

  /** A call whose reply is always awaited. */
  static unboundedWait (router: CallRouter, callee: Principal, method: Method): Call {
    return new Call(router, callee, method, 'unbounded')
  }

  /** A call that may give up waiting after a timeout. */
  static boundedWait (router: CallRouter, callee: Principal, method: Method): Call {
    return new Call(router, callee, method, 'bounded')
  }

  /** Same as `unboundedWait`. */
  static new (router: CallRouter, callee: Principal, method: Method): Call {
    return Call.unboundedWait(router, callee, method)
  }

  args:           unknown[] = []
  cycles:         Cycles    = 0n
  timeoutSeconds: number    = Call.DEFAULT_TIMEOUT_SECONDS

  constructor (
    readonly router: CallRouter,
    readonly callee: Principal,
    readonly method: Method,
    readonly wait:   WaitMode,
  ) {}

  withArg (arg: unknown): this {
    this.args = [arg]
    return this
  }

  withArgs (...args: unknown[]): this {
    this.args = args
    return this
  }

  withCycles (cycles: Cycles|number): this {
    this.cycles = BigInt(cycles)
    return this
  }

  withTimeout (seconds: number): this {
    if (this.wait !== 'bounded') throw new IccError.TimeoutOnUnboundedWait()
    this.timeoutSeconds = seconds
    return this
  }

  get request (): CallRequest {
    const { callee, method, args, cycles, wait, timeoutSeconds } = this
    return { callee, method, args, cycles, wait, timeoutSeconds }
  }

  /** Perform the call and decode the reply. */
  async call <T> (decoder: Decoder<T>): Promise<T> {
    const reply = await this.router.route(this.request)
    const decoded = decoder.safeParse(reply)
    if (!decoded.success) {
      throw new CandidDecodingFailed(decoded.error.issues.map(issue=>
        `${issue.path.join('.') || '(reply)'}: ${issue.message}`
      ).join('; '), reply)
    }
    return decoded.data
  }

  /** Perform the call and return the reply as is. */
  callRaw (): Promise<unknown> {
    return this.router.route(this.request)
  }
}
