/** Fadroma. Copyright (C) 2023 Hack.bg. License: GNU AGPLv3 or custom.
    You should have received a copy of the GNU Affero General Public License
    along with this program.  If not, see <http://www.gnu.org/licenses/>. **/
import { z } from 'zod'
import { NANOS_PER_SECOND } from '../agent/base'
import { opt } from '../agent/candid'
import { Canister, defineCanister } from '../agent/canister'
import type { CanisterContext, IncomingMessage } from '../agent/canister'
import { resultSchema } from '../agent/result'
import type { Result } from '../agent/result'
import { nat64Schema, natSchema } from '../agent/token'

/** Cycles charged for one rate. */
export const XRC_FEE = 1_000_000_000n

/** Rates are integers scaled by 10^9. */
export const XRC_DECIMALS = 9

const SCALE = 10n ** BigInt(XRC_DECIMALS)

export const assetClassSchema = z.union([
  z.object({ Cryptocurrency: z.null() }),
  z.object({ FiatCurrency: z.null() }),
])

export const assetSchema = z.object({ symbol: z.string(), class: assetClassSchema })

export type Asset = z.infer<typeof assetSchema>

export const getExchangeRateRequestSchema = z.object({
  base_asset:  assetSchema,
  quote_asset: assetSchema,
  timestamp:   opt(nat64Schema),
})

export type GetExchangeRateRequest = z.infer<typeof getExchangeRateRequestSchema>

export const exchangeRateSchema = z.object({
  base_asset:  assetSchema,
  quote_asset: assetSchema,
  timestamp:   nat64Schema,
  rate:        nat64Schema,
  metadata:    z.object({
    decimals:                       z.number().int(),
    base_asset_num_queried_sources: natSchema,
    base_asset_num_received_rates:  natSchema,
    quote_asset_num_queried_sources: natSchema,
    quote_asset_num_received_rates:  natSchema,
    standard_deviation:             nat64Schema,
    forex_timestamp:                opt(nat64Schema),
  })
})

export type ExchangeRate = z.infer<typeof exchangeRateSchema>

export const exchangeRateErrorSchema = z.union([
  z.object({ AnonymousPrincipalNotAllowed: z.null() }),
  z.object({ Pending:                      z.null() }),
  z.object({ CryptoBaseAssetNotFound:      z.null() }),
  z.object({ CryptoQuoteAssetNotFound:     z.null() }),
  z.object({ ForexBaseAssetNotFound:       z.null() }),
  z.object({ ForexQuoteAssetNotFound:      z.null() }),
  z.object({ RateLimited:                  z.null() }),
  z.object({ NotEnoughCycles:              z.null() }),
  z.object({ Other: z.object({ code: z.number().int(), description: z.string() }) }),
])

export type ExchangeRateError = z.infer<typeof exchangeRateErrorSchema>

export const getExchangeRateResultSchema = resultSchema(exchangeRateSchema, exchangeRateErrorSchema)

export const xrcInitSchema = z.object({
  /** USD value of each asset, scaled by 10^9. */
  rates: z.array(z.tuple([assetSchema, nat64Schema]))
})

export type XrcInit = z.infer<typeof xrcInitSchema>

export const crypto = (symbol: string): Asset => ({ symbol, class: { Cryptocurrency: null } })

export const fiat = (symbol: string): Asset => ({ symbol, class: { FiatCurrency: null } })

/** Exchange rate canister serving fixed USD rates. */
export class XrcCanister extends Canister {
  usdRates = new Map<string, bigint>()

  constructor (ic: CanisterContext, init: XrcInit) {
    super(ic)
    for (const [asset, rate] of init.rates) this.usdRates.set(assetKey(asset), rate)
    this.update('get_exchange_rate', z.tuple([getExchangeRateRequestSchema]),
      ([request], message) => this.getExchangeRate(request, message))
  }

  getExchangeRate (
    request: GetExchangeRateRequest, message: IncomingMessage
  ): Result<ExchangeRate, ExchangeRateError> {
    if (message.caller.isAnonymous()) {
      return { Err: { AnonymousPrincipalNotAllowed: null } }
    }
    if (message.cycles < XRC_FEE) {
      return { Err: { NotEnoughCycles: null } }
    }
    message.acceptCycles(XRC_FEE)
    const { base_asset, quote_asset } = request
    const base = this.usdRate(base_asset)
    if (base === undefined) {
      return { Err: ('Cryptocurrency' in base_asset.class)
        ? { CryptoBaseAssetNotFound: null }
        : { ForexBaseAssetNotFound: null } }
    }
    const quote = this.usdRate(quote_asset)
    if (quote === undefined || quote === 0n) {
      return { Err: ('Cryptocurrency' in quote_asset.class)
        ? { CryptoQuoteAssetNotFound: null }
        : { ForexQuoteAssetNotFound: null } }
    }
    const minute = 60n * NANOS_PER_SECOND
    const timestamp = request.timestamp[0] ?? (this.ic.time() / minute) * 60n
    return { Ok: {
      base_asset,
      quote_asset,
      timestamp,
      rate: base * SCALE / quote,
      metadata: {
        decimals:                        XRC_DECIMALS,
        base_asset_num_queried_sources:  1n,
        base_asset_num_received_rates:   1n,
        quote_asset_num_queried_sources: 1n,
        quote_asset_num_received_rates:  1n,
        standard_deviation:              0n,
        forex_timestamp:                 [],
      }
    } }
  }

  private usdRate (asset: Asset): bigint|undefined {
    const rate = this.usdRates.get(assetKey(asset))
    if (rate === undefined && asset.symbol === 'USD' && 'FiatCurrency' in asset.class) return SCALE
    return rate
  }
}

function assetKey ({ symbol, class: assetClass }: Asset) {
  return `${Object.keys(assetClass)[0]}:${symbol.toUpperCase()}`
}

export const Xrc = defineCanister('xrc', xrcInitSchema,
  (ic, init) => new XrcCanister(ic, init))
