/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Error } from '../agent/base'

export default class DevnetError extends Error {

  /** The message is the install guidance for the tool. */
  static MissingTool = this.define('MissingTool',
    (guidance: string[]) => guidance.join('\n'))

  static CommandFailed = this.define('CommandFailed',
    (command: string, code: number, stderr: string) =>
      `Command failed with exit code ${code}: ${command}` + (stderr ? `\n${stderr}` : ''))

  static DownloadFailed = this.define('DownloadFailed',
    (url: string, status: number) => `Downloading ${url} failed with HTTP status ${status}`)

  static NotRunning = this.define('NotRunning',
    () => 'The devnet is not running. Start it first.')

  static NoCanister = this.define('NoCanister',
    (name: string) => `No canister named "${name}" was created on this devnet`)

  static NoModule = this.define('NoModule',
    (name: string) => `No code available for canister "${name}"`)

}
