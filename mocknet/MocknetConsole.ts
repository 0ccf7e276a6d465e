/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { Console } from '../agent/base'
import config from '../config'

/** Only prints debug output when `ICC_MOCKNET_DEBUG` is set. */
export default class MocknetConsole extends Console {
  constructor (label?: string) {
    super(label)
    // `debug` is an instance field of the base console, so it is wrapped here.
    const debug = this.debug.bind(this)
    this.debug = (...args: Parameters<typeof debug>) => config.mocknet.debug ? debug(...args) : this
  }
}
