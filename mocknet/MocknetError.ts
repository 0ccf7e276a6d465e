/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Error } from '../agent/base'

export default class MocknetError extends Error {

  static NoCanister = this.define('NoCanister',
    (id: string) => `Mocknet: no canister ${id}`)

  static CanisterExists = this.define('CanisterExists',
    (id: string) => `Mocknet: canister ${id} already exists`)

  static AlreadyInstalled = this.define('AlreadyInstalled',
    (id: string) => `Mocknet: canister ${id} already has code installed; use reinstall mode`)

  static InstallFailed = this.define('InstallFailed',
    (id: string, reason: string) => `Mocknet: installing code on ${id} failed: ${reason}`)

}
