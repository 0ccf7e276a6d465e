/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import type { Principal } from '@dfinity/principal'
import { Logged } from '../agent/base'
import type { Console, Name } from '../agent/base'
import type { AccountIdentifier } from '../agent/account'
import type { Candid } from '../agent/candid'
import type { InstallMode } from '../mocknet/mocknet'
import DevnetError from './DevnetError'

/** A command-line tool that a devnet needs, with what to tell the user if it's missing. */
export interface RequiredTool {
  name:     string
  guidance: string[]
}

export const JQ: RequiredTool = {
  name: 'jq',
  guidance: [
    'jq is not installed. Please install it before running this script.'
  ]
}

export const DFX: RequiredTool = {
  name: 'dfx',
  guidance: [
    'dfx is not installed. Please install it before running this script.',
    'You can install by running:',
    'sh -ci "$(curl -fsSL https://internetcomputer.org/install.sh)"',
  ]
}

export interface StartOptions {
  /** Discard the state of any previous run. */
  clean?:      boolean
  /** Return once the replica is up instead of waiting for it to exit. */
  background?: boolean
}

/** A private local replica that canisters can be created on. */
export abstract class Devnet extends Logged {
  /** Which kind of devnet this is. */
  abstract readonly platform: string
  /** Tools checked by `requireTools`, in order. */
  requiredTools: RequiredTool[] = []
  /** Is this thing on? */
  running: boolean = false

  constructor (properties?: { log?: Console }) {
    super(properties)
  }

  /** Fail with the install guidance of the first missing tool. */
  async requireTools (): Promise<this> {
    for (const tool of this.requiredTools) {
      if (!await this.hasTool(tool.name)) {
        this.log.missingTool(tool.name)
        throw new DevnetError.MissingTool(tool.guidance)
      }
    }
    return this
  }

  protected abstract hasTool (name: string): Promise<boolean>

  /** Stop the replica. Does not fail if it wasn't running. */
  abstract stop (): Promise<this>

  abstract start (options?: StartOptions): Promise<this>

  abstract createCanister (name: Name, options?: { specifiedId?: Principal }): Promise<void>

  abstract canisterId (name: Name): Promise<Principal>

  abstract build (name: Name): Promise<void>

  /** Obtain the ICP ledger's code for the named canister. */
  abstract fetchLedger (name: Name): Promise<void>

  /** Account of the given principal, or of the current identity. */
  abstract accountId (ofPrincipal?: Principal): Promise<AccountIdentifier>

  abstract install (name: Name, argument: Candid, mode?: InstallMode): Promise<void>
}
