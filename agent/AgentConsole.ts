/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Console as BaseConsole, bold, colors } from '@hackbg/logs'

export { bold, colors }

export default class Console extends BaseConsole {

  constructor (label: string = 'ICC') {
    super(label)
    this.label = label
  }

  /** Print the outcome of a call between canisters. */
  callOutcome (caller: string, callee: string, method: string, outcome: string) {
    this.debug(`${bold(caller)} -> ${bold(callee)}.${bold(method)}:`, outcome)
  }

  /** Print the accounts that received funds during setup. */
  balances (balances: Array<[string, string]>) {
    const len = Math.max(0, ...balances.map(([name])=>name.length))
    for (const [name, amount] of balances) {
      this.info(colors.dim(`${name}:`.padEnd(len + 2)), bold(amount))
    }
  }

  canisterCreated (name: string, id: string) {
    this.log(`Created canister ${bold(name)}:`, bold(id))
  }

  missingTool (tool: string) {
    this.error(`${bold(tool)} (not found)`)
  }

}
