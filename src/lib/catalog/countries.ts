export interface Country {
  /** Internal key, ISO 3166 alpha-3. */
  code: string
  displayName: string
  /** Alpha-2 code expected by the IMF DataMapper. */
  apiCode: string
}

export const COUNTRY_CODES = ['USA', 'MEX', 'BRA', 'ESP', 'ARG', 'COL', 'CHL', 'PER', 'DEU', 'FRA', 'GBR', 'CHN'] as const

export type CountryCode = (typeof COUNTRY_CODES)[number]

export const COUNTRIES: Readonly<Record<CountryCode, Readonly<Country>>> = Object.freeze({
  USA: Object.freeze({ code: 'USA', displayName: 'United States', apiCode: 'US' }),
  MEX: Object.freeze({ code: 'MEX', displayName: 'Mexico', apiCode: 'MX' }),
  BRA: Object.freeze({ code: 'BRA', displayName: 'Brazil', apiCode: 'BR' }),
  ESP: Object.freeze({ code: 'ESP', displayName: 'Spain', apiCode: 'ES' }),
  ARG: Object.freeze({ code: 'ARG', displayName: 'Argentina', apiCode: 'AR' }),
  COL: Object.freeze({ code: 'COL', displayName: 'Colombia', apiCode: 'CO' }),
  CHL: Object.freeze({ code: 'CHL', displayName: 'Chile', apiCode: 'CL' }),
  PER: Object.freeze({ code: 'PER', displayName: 'Peru', apiCode: 'PE' }),
  DEU: Object.freeze({ code: 'DEU', displayName: 'Germany', apiCode: 'DE' }),
  FRA: Object.freeze({ code: 'FRA', displayName: 'France', apiCode: 'FR' }),
  GBR: Object.freeze({ code: 'GBR', displayName: 'United Kingdom', apiCode: 'GB' }),
  CHN: Object.freeze({ code: 'CHN', displayName: 'China', apiCode: 'CN' }),
})

export function getCountry(code: CountryCode): Readonly<Country> {
  return COUNTRIES[code]
}

export function resolveCountries(codes: readonly CountryCode[]): Readonly<Country>[] {
  return codes.map(getCountry)
}
