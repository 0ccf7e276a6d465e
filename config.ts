/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import dotenv from 'dotenv'
import IccError from './agent/AgentError'
import { DEFAULT_OWNER, ICP_LEDGER_CANISTER_ID, XRC_CANISTER_ID } from './canisters/backend'
import { LEDGER_SCRIPT_URL } from './devnet/dfx'

/** Update `process.env` with value from `.env` file */
dotenv.config()

export type Env = Record<string, string|undefined>

export type DevnetPlatform = 'dfx'|'mocknet'

export class IccConfig {
  /** Project settings. */
  project: {
    /** The dfx project's root directory. */
    root: string
  }
  /** Devnet settings. */
  devnet: {
    /** Which kind of devnet `setup` provisions. */
    platform: DevnetPlatform
    /** The dfx executable. */
    dfx: string
    /** Script that fetches the ICP ledger. */
    ledgerScriptUrl: string
  }
  /** Canister settings. */
  canisters: {
    /** Name of the ledger canister in dfx.json. */
    ledgerName: string
    /** Name of the backend canister in dfx.json. */
    backendName: string
    ledgerId: string
    xrcId: string
    /** Principal allowed to transfer the backend's ICP. */
    owner: string
  }
  /** Mocknet settings. */
  mocknet: {
    /** Print every routed message. */
    debug: boolean
  }

  constructor (readonly env: Env = process.env) {
    this.project = {
      root:            getEnvString(env, 'ICC_PROJECT_ROOT',       ()=>process.cwd()),
    }
    this.devnet = {
      platform:        getEnvPlatform(env, 'ICC_DEVNET',           ()=>'dfx'),
      dfx:             getEnvString(env, 'ICC_DFX',                ()=>'dfx'),
      ledgerScriptUrl: getEnvString(env, 'ICC_LEDGER_SCRIPT_URL',  ()=>LEDGER_SCRIPT_URL),
    }
    this.canisters = {
      ledgerName:      getEnvString(env, 'ICC_LEDGER_CANISTER',    ()=>'icp_ledger_canister'),
      backendName:     getEnvString(env, 'ICC_BACKEND_CANISTER',   ()=>'backend'),
      ledgerId:        getEnvString(env, 'ICC_LEDGER_CANISTER_ID', ()=>ICP_LEDGER_CANISTER_ID),
      xrcId:           getEnvString(env, 'ICC_XRC_CANISTER_ID',    ()=>XRC_CANISTER_ID),
      owner:           getEnvString(env, 'ICC_OWNER',              ()=>DEFAULT_OWNER),
    }
    this.mocknet = {
      debug:           getEnvBool(env, 'ICC_MOCKNET_DEBUG',        ()=>false),
    }
  }
}

export function getEnvString (env: Env, name: string, fallback: ()=>string): string {
  const value = env[name]
  return (value === undefined) ? fallback() : value
}

/** Empty, `0`, `false` and `no` are false. */
export function getEnvBool (env: Env, name: string, fallback: ()=>boolean): boolean {
  const value = env[name]
  if (value === undefined) return fallback()
  return !['', '0', 'false', 'no'].includes(value.trim().toLowerCase())
}

function getEnvPlatform (env: Env, name: string, fallback: ()=>DevnetPlatform): DevnetPlatform {
  const value = env[name]
  if (value === undefined) return fallback()
  if (value === 'dfx' || value === 'mocknet') return value
  throw new IccError.InvalidDevnetPlatform(name, value)
}

export default new IccConfig()
