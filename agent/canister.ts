/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import type { Principal } from '@dfinity/principal'
import IccError from './AgentError'
import { Logged } from './base'
import type { Console, Cycles, Method, Nanos } from './base'
import type { CallRouter, Decoder } from './call'

export type MethodKind = 'update'|'query'

/** What a canister knows about the system it runs on. */
export interface CanisterContext extends CallRouter {
  /** Id of the running canister. */
  readonly self: Principal
  /** Current time, in nanoseconds since the epoch. */
  time (): Nanos
  /** Cycles currently held by the canister. */
  cyclesBalance (): Cycles
}

/** The message being executed. */
export interface IncomingMessage {
  caller: Principal
  method: Method
  /** Cycles attached to the call. */
  cycles: Cycles
  /** Keep up to `max` of the attached cycles; the rest is refunded. Returns the accepted amount. */
  acceptCycles (max: Cycles): Cycles
}

/** An exported method with its argument decoder erased. */
export interface ExportedMethod {
  kind: MethodKind
  invoke (args: unknown[], message: IncomingMessage): Promise<unknown>
}

/** The canister aborted the message. The caller sees a canister error. */
export class Trap extends IccError {
  constructor (readonly reason: string) {
    super(`Canister trapped: ${reason}`)
  }
}

/** The canister explicitly rejected the message. */
export class Reject extends IccError {
  constructor (readonly reason: string) {
    super(`Canister rejected the message: ${reason}`)
  }
}

export function trap (reason: string): never {
  throw new Trap(reason)
}

export function reject (reason: string): never {
  throw new Reject(reason)
}

/** Decoder for a method that takes no arguments. */
export const noArgs = z.tuple([])

/** Program running on a canister. Subclasses export their methods from the constructor. */
export abstract class Canister extends Logged {

  readonly methods = new Map<Method, ExportedMethod>()

  constructor (readonly ic: CanisterContext, properties?: { log?: Console }) {
    super(properties)
  }

  protected update <A extends unknown[]> (
    name: Method, args: Decoder<A>, handler: (args: A, message: IncomingMessage)=>unknown
  ): this {
    return this.export('update', name, args, handler)
  }

  protected query <A extends unknown[]> (
    name: Method, args: Decoder<A>, handler: (args: A, message: IncomingMessage)=>unknown
  ): this {
    return this.export('query', name, args, handler)
  }

  private export <A extends unknown[]> (
    kind: MethodKind,
    name: Method,
    args: Decoder<A>,
    handler: (args: A, message: IncomingMessage)=>unknown
  ): this {
    this.methods.set(name, {
      kind,
      invoke: async (raw, message) => {
        const decoded = args.safeParse(raw)
        if (!decoded.success) {
          trap(`failed to decode arguments of ${name}: ${decoded.error.issues[0]?.message}`)
        }
        return await handler(decoded.data, message)
      }
    })
    return this
  }
}

/** Code that can be installed on a canister. */
export interface CanisterModule {
  /** Name of the module, as it appears in logs. */
  readonly name: string
  /** Decode the install argument and start the program. Throws on an invalid argument. */
  instantiate (ic: CanisterContext, init: unknown): Canister
}

/** Define a canister module with a typed install argument. */
export function defineCanister <I> (
  name: string,
  init: Decoder<I>,
  create: (ic: CanisterContext, init: I)=>Canister
): CanisterModule {
  return {
    name,
    instantiate (ic, raw) {
      const decoded = init.safeParse(raw)
      if (!decoded.success) {
        throw new Trap(`invalid install argument for ${name}: ${decoded.error.issues[0]?.message}`)
      }
      return create(ic, decoded.data)
    }
  }
}
