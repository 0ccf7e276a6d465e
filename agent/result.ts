/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { Error, describe } from './base'

/** Outcome of a canister method that can fail. */
export type Result<T, E = string> = { Ok: T } | { Err: E }

export const Ok = <T> (value: T): { Ok: T } => ({ Ok: value })

export const Err = <E> (error: E): { Err: E } => ({ Err: error })

export function isOk <T, E> (result: Result<T, E>): result is { Ok: T } {
  return 'Ok' in result
}

export function isErr <T, E> (result: Result<T, E>): result is { Err: E } {
  return 'Err' in result
}

/** Return the value or throw the error. */
export function unwrap <T, E> (result: Result<T, E>): T {
  if ('Ok' in result) return result.Ok
  throw new Error.Unwrap(describe(result.Err))
}

/** Decoder for a `Result` returned by a canister. */
export function resultSchema <T extends z.ZodTypeAny, E extends z.ZodTypeAny> (ok: T, err: E) {
  return z.union([z.object({ Ok: ok }), z.object({ Err: err })])
}
