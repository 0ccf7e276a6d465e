/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Principal } from '@dfinity/principal'
import { NANOS_PER_SECOND, bold } from '../agent/base'
import type { Cycles, Method, Nanos } from '../agent/base'
import { CallRejected, CanisterError, RejectCode, SysUnknown } from '../agent/call'
import type { CallRequest } from '../agent/call'
import { Reject, Trap } from '../agent/canister'
import type { Canister, CanisterContext, CanisterModule, IncomingMessage, MethodKind } from '../agent/canister'
import { Endpoint } from '../agent/connec'
import { MANAGEMENT_CANISTER, canisterIdFromIndex } from '../agent/identity'
import MocknetConsole from './MocknetConsole'
import MocknetError from './MocknetError'
import { Management } from './management'

/** Ways the mocknet can make a call fail. */
export type FaultKind =
  | 'SysFatal' | 'SysTransient' | 'DestinationInvalid' | 'CanisterReject'
  | 'SysUnknown'
  | 'Trap'

/** A failure to inject into calls between canisters. */
export interface Fault {
  kind:      FaultKind
  /** Only calls to this canister. */
  callee?:   Principal|string
  /** Only calls to this method. */
  method?:   Method
  /** The reject is raised before the call leaves the caller. */
  sync?:     boolean
  /** For `SysUnknown`: whether the callee still executes the call. */
  executed?: boolean
  /** How many matching calls fail. Defaults to 1. */
  times?:    number
  /** Seconds of replica time that pass before the failure is reported. */
  delay?:    number
  message?:  string
}

export type InstallMode = 'install'|'reinstall'|'upgrade'

/** A canister as tracked by the mocknet. */
export interface MocknetCanister {
  id:          Principal
  name?:       string
  controllers: Principal[]
  cycles:      Cycles
  module?:     CanisterModule
  program?:    Canister
}

/** In-process replica. Routes messages between canister programs. */
export class Mocknet extends Endpoint {
  /** Cycles a new canister starts with. */
  static readonly INITIAL_CYCLES = 100_000_000_000_000n
  /** Replica time that passes for each executed message. */
  static readonly ROUND_NANOS = NANOS_PER_SECOND

  log = new MocknetConsole('Mocknet')
  /** Replica time. */
  now: Nanos
  /** Seed for threshold keys. */
  seed: string
  /** Index of the next allocated canister id. */
  nextIndex = 0n
  canisters = new Map<string, MocknetCanister>()
  faults: Array<Fault & { remaining: number }> = []

  constructor (properties: { now?: Nanos, seed?: string } = {}) {
    super({ id: 'mocknet' })
    this.now  = properties.now ?? BigInt(Date.now()) * 1_000_000n
    this.seed = properties.seed ?? 'mocknet'
    this.canisters.set(MANAGEMENT_CANISTER.toText(), {
      id: MANAGEMENT_CANISTER, name: 'management', controllers: [], cycles: 0n
    })
    this.install(MANAGEMENT_CANISTER, Management(this.seed), null)
  }

  getTime (): Promise<Nanos> {
    return Promise.resolve(this.now)
  }

  getCyclesBalance (canisterId: Principal): Promise<Cycles> {
    return Promise.resolve(this.getCanister(canisterId).cycles)
  }

  /** Let some replica time pass. */
  advance (seconds: number|bigint): this {
    this.now += BigInt(seconds) * NANOS_PER_SECOND
    return this
  }

  getCanister (id: Principal|string): MocknetCanister {
    const text = (typeof id === 'string') ? id : id.toText()
    const canister = this.canisters.get(text)
    if (!canister) throw new MocknetError.NoCanister(text)
    return canister
  }

  /** Create an empty canister, at the next free index or at the given id. */
  createCanister (options: {
    specifiedId?: Principal, name?: string, cycles?: Cycles, controllers?: Principal[]
  } = {}): Principal {
    let id = options.specifiedId
    if (id) {
      if (this.canisters.has(id.toText())) throw new MocknetError.CanisterExists(id.toText())
    } else {
      do {
        id = canisterIdFromIndex(this.nextIndex++)
      } while (this.canisters.has(id.toText()))
    }
    this.canisters.set(id.toText(), {
      id,
      name:        options.name,
      controllers: options.controllers ?? [],
      cycles:      options.cycles ?? Mocknet.INITIAL_CYCLES,
    })
    this.log.debug(`Created canister ${bold(id.toText())}`, options.name ?? '')
    return id
  }

  /** Put a program on a canister. Reinstalling or upgrading starts from a fresh state. */
  install (id: Principal, module: CanisterModule, init: unknown, mode: InstallMode = 'install'): Canister {
    const canister = this.getCanister(id)
    if (mode === 'install' && canister.program) {
      throw new MocknetError.AlreadyInstalled(id.toText())
    }
    let program: Canister
    try {
      program = module.instantiate(this.context(id), init)
    } catch (e) {
      throw new MocknetError.InstallFailed(id.toText(), (e instanceof Error) ? e.message : String(e))
    }
    canister.module  = module
    canister.program = program
    this.log.debug(`Installed ${bold(module.name)} on ${bold(id.toText())} (${mode})`)
    return program
  }

  /** Make upcoming calls between canisters fail. */
  inject (fault: Fault): this {
    this.faults.push({ ...fault, remaining: fault.times ?? 1 })
    return this
  }

  /** Remove all pending faults. */
  heal (): this {
    this.faults = []
    return this
  }

  /** Messages from users. */
  async submit (
    sender: Principal, canisterId: Principal, method: Method, args: unknown[], kind: MethodKind
  ): Promise<unknown> {
    await nextTick()
    if (kind === 'update') this.now += Mocknet.ROUND_NANOS
    const { reply } = await this.execute(sender, canisterId, method, args, 0n, kind)
    return reply
  }

  /** Messages from canisters. */
  async route (sender: Principal, request: CallRequest): Promise<unknown> {
    const caller = this.getCanister(sender)
    const { callee, method, cycles, wait } = request
    if (caller.cycles < cycles) {
      throw new CallRejected(RejectCode.SysTransient,
        `Canister ${sender.toText()} can't attach ${cycles} cycles: balance is ${caller.cycles}`, true)
    }
    caller.cycles -= cycles
    const refund = (amount: Cycles) => { caller.cycles += amount }

    await nextTick()
    this.now += Mocknet.ROUND_NANOS
    const sent = this.now

    const fault = this.takeFault(callee, method)
    if (fault) {
      if (fault.delay) this.now += BigInt(Math.round(fault.delay * 1e9))
      const message = fault.message ?? `injected ${fault.kind}`
      switch (fault.kind) {
        case 'SysFatal':
        case 'SysTransient':
        case 'DestinationInvalid':
        case 'CanisterReject':
          refund(cycles)
          throw new CallRejected(RejectCode[fault.kind], message, fault.sync ?? false)
        case 'Trap':
          refund(cycles)
          throw new CanisterError(`Canister ${callee.toText()} trapped: ${message}`)
        case 'SysUnknown':
          // Unbounded-wait calls always learn the outcome.
          if (wait === 'bounded') {
            if (fault.executed) {
              await this.execute(sender, callee, method, request.args, cycles, 'update').then(
                ({ accepted }) => this.log.debug(`Reply lost after accepting ${accepted} cycles`),
                (error: unknown) => this.log.debug(`Lost outcome of failed call:`, error)
              )
            }
            throw new SysUnknown(message)
          }
      }
    }

    let outcome: { reply: unknown, accepted: Cycles }
    try {
      outcome = await this.execute(sender, callee, method, request.args, cycles, 'update')
    } catch (e) {
      refund(cycles)
      throw e
    }
    if (wait === 'bounded' && this.now - sent > BigInt(request.timeoutSeconds) * NANOS_PER_SECOND) {
      throw new SysUnknown(`Timed out waiting for ${callee.toText()}.${method}`)
    }
    refund(cycles - outcome.accepted)
    return outcome.reply
  }

  private takeFault (callee: Principal, method: Method): Fault|undefined {
    const index = this.faults.findIndex(fault =>
      (fault.callee === undefined || String(fault.callee) === callee.toText()) &&
      (fault.method === undefined || fault.method === method))
    if (index < 0) return undefined
    const fault = this.faults[index]
    fault.remaining--
    if (fault.remaining <= 0) this.faults.splice(index, 1)
    return fault
  }

  private async execute (
    sender: Principal, calleeId: Principal, method: Method, args: unknown[], cycles: Cycles, kind: MethodKind
  ): Promise<{ reply: unknown, accepted: Cycles }> {
    const text = calleeId.toText()
    const callee = this.canisters.get(text)
    if (!callee) {
      throw new CallRejected(RejectCode.DestinationInvalid, `Canister ${text} not found`)
    }
    if (!callee.program) {
      throw new CanisterError(`Canister ${text} is empty`)
    }
    const exported = callee.program.methods.get(method)
    if (!exported) {
      throw new CanisterError(`Canister ${text} has no ${kind} method '${method}'`)
    }
    if (kind === 'query' && exported.kind !== 'query') {
      throw new CanisterError(`Canister ${text} has no query method '${method}'`)
    }
    let accepted = 0n
    const message: IncomingMessage = {
      caller: sender,
      method,
      cycles,
      acceptCycles: (max) => {
        const amount = (max < cycles - accepted) ? max : cycles - accepted
        accepted += amount
        callee.cycles += amount
        return amount
      }
    }
    try {
      const reply = await exported.invoke(args, message)
      this.log.callOutcome(sender.toText(), text, method, 'replied')
      return { reply: (reply === undefined) ? null : reply, accepted }
    } catch (e) {
      callee.cycles -= accepted
      this.log.callOutcome(sender.toText(), text, method, (e instanceof Error) ? e.message : String(e))
      if (e instanceof Reject) {
        throw new CallRejected(RejectCode.CanisterReject, e.reason)
      }
      const reason = (e instanceof Trap) ? e.reason : (e instanceof Error) ? e.message : String(e)
      throw new CanisterError(`Canister ${text} trapped: ${reason}`)
    }
  }

  private context (id: Principal): CanisterContext {
    return {
      self:          id,
      time:          () => this.now,
      cyclesBalance: () => this.getCanister(id).cycles,
      route:         (request) => this.route(id, request),
    }
  }
}

function nextTick (): Promise<void> {
  return new Promise(resolve => setImmediate(resolve))
}
