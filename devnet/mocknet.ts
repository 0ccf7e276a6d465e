/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { Principal } from '@dfinity/principal'
import { bold } from '../agent/base'
import type { Console, Name, Nanos } from '../agent/base'
import { AccountIdentifier } from '../agent/account'
import { toJs } from '../agent/candid'
import type { Candid } from '../agent/candid'
import type { CanisterModule } from '../agent/canister'
import { Connection } from '../agent/connec'
import { Identity } from '../agent/identity'
import { Mocknet } from '../mocknet/mocknet'
import type { InstallMode } from '../mocknet/mocknet'
import { Backend } from '../canisters/backend'
import { Caller } from '../canisters/caller'
import { Counter } from '../canisters/counter'
import { Ledger } from '../canisters/ledger'
import { Xrc } from '../canisters/xrc'
import { Devnet } from './devnet'
import type { StartOptions } from './devnet'
import DevnetError from './DevnetError'

/** Code for the canisters a project defines, by canister name. */
export const DEFAULT_MODULES: Record<Name, CanisterModule> = {
  icp_ledger_canister: Ledger,
  backend:             Backend,
  caller:              Caller,
  counter:             Counter,
  xrc:                 Xrc,
}

/** A devnet that runs in the current process. */
export class MocknetDevnet extends Devnet {
  readonly platform = 'mocknet'
  /** Replica of the current run. */
  mocknet?: Mocknet
  /** Code for each canister name. */
  modules:  Record<Name, CanisterModule>
  /** Canisters created during the current run. */
  names = new Map<Name, Principal>()
  /** Replica time at start. */
  genesis?: Nanos

  #identity?: Identity

  constructor (properties: {
    modules?: Record<Name, CanisterModule>
    identity?: Identity
    genesis?: Nanos
    log?: Console
  } = {}) {
    super(properties)
    this.modules   = properties.modules ?? DEFAULT_MODULES
    this.genesis   = properties.genesis
    this.#identity = properties.identity
  }

  protected hasTool (_name: string): Promise<boolean> {
    return Promise.resolve(true)
  }

  async stop (): Promise<this> {
    this.running = false
    return this
  }

  async start ({ clean = true }: StartOptions = {}): Promise<this> {
    if (clean || !this.mocknet) {
      this.mocknet = new Mocknet({ now: this.genesis })
      this.names.clear()
    }
    this.running = true
    return this
  }

  /** The running replica. */
  getMocknet (): Mocknet {
    if (!this.running || !this.mocknet) {
      throw new DevnetError.NotRunning()
    }
    return this.mocknet
  }

  async createCanister (name: Name, { specifiedId }: { specifiedId?: Principal } = {}): Promise<void> {
    const id = this.getMocknet().createCanister({ specifiedId, name })
    this.names.set(name, id)
    this.log.canisterCreated(name, id.toText())
  }

  async canisterId (name: Name): Promise<Principal> {
    const id = this.names.get(name)
    if (!id) throw new DevnetError.NoCanister(name)
    return id
  }

  async build (name: Name): Promise<void> {
    if (!this.modules[name]) throw new DevnetError.NoModule(name)
    this.log.debug(`Using built-in code for ${bold(name)}`)
  }

  /** The ledger is built in, so this only checks that there's code for it. */
  fetchLedger (name: Name): Promise<void> {
    return this.build(name)
  }

  /** The current identity, created from a fixed seed on first use. */
  async getIdentity (): Promise<Identity> {
    this.#identity ??= await Identity.fromSeed('default', 'default')
    return this.#identity
  }

  async accountId (ofPrincipal?: Principal): Promise<AccountIdentifier> {
    return AccountIdentifier.fromPrincipal(ofPrincipal ?? (await this.getIdentity()).principal)
  }

  async install (name: Name, argument: Candid, mode: InstallMode = 'install'): Promise<void> {
    const code = this.modules[name]
    if (!code) throw new DevnetError.NoModule(name)
    this.getMocknet().install(await this.canisterId(name), code, toJs(argument), mode)
  }

  /** Connect to the replica as the current identity. */
  async connect (): Promise<Connection> {
    return new Connection({ endpoint: this.getMocknet(), identity: await this.getIdentity() })
  }
}
