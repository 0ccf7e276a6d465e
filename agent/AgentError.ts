/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Error } from '@hackbg/oops'

/** Error kinds. */
export default class IccError extends Error {

  static InvalidPrincipal = this.define('InvalidPrincipal',
    (text: string, reason?: string) => `Invalid principal "${text}"` +
      (reason ? `: ${reason}` : ''))

  static InvalidCanisterIndex = this.define('InvalidCanisterIndex',
    (index: bigint) => `Canister index out of range: ${index}`)

  static InvalidAccountId = this.define('InvalidAccountId',
    (reason: string) => `Invalid account identifier: ${reason}`)

  static InvalidSubaccount = this.define('InvalidSubaccount',
    (length: number) => `Subaccount must be 32 bytes long, got ${length}`)

  static InvalidTokens = this.define('InvalidTokens',
    (value: string) => `Invalid token amount: ${value}`)

  static NoEndpoint = this.define('NoEndpoint',
    () => "Not connected. Pass an endpoint to the connection.")

  static NoConnection = this.define('NoConnection',
    (canisterId: string) => `Client for ${canisterId} has no connection.`)

  static TimeoutOnUnboundedWait = this.define('TimeoutOnUnboundedWait',
    () => "Only bounded-wait calls can have a timeout.")

  static InvalidDevnetPlatform = this.define('InvalidDevnetPlatform',
    (name: string, value: string) => `${name} must be "dfx" or "mocknet", got "${value}"`)

  static Unwrap = this.define('Unwrap',
    (error: string) => `Unwrapped an error result: ${error}`)

}
