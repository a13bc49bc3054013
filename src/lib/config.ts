import { z } from 'zod'

const EnvSchema = z.object({
  IMF_API_BASE_URL: z.string().url().optional(),
  IMF_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  IMF_REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
})

// Referenced one by one so Next can inline them in client bundles.
const parsedEnv = EnvSchema.safeParse({
  IMF_API_BASE_URL: process.env.IMF_API_BASE_URL || undefined,
  IMF_TIMEOUT_MS: process.env.IMF_TIMEOUT_MS || undefined,
  IMF_REQUEST_DELAY_MS: process.env.IMF_REQUEST_DELAY_MS || undefined,
})

if (!parsedEnv.success) {
  console.warn('Ignoring invalid IMF environment overrides:', parsedEnv.error.issues)
}

const env = parsedEnv.success ? parsedEnv.data : {}

export const CONFIG = {
  app: {
    name: 'Macro Compare Dashboard',
    title: 'Complete Economic Analysis (IMF Data)',
    description: 'Comparative macroeconomic indicators for selected countries',
  },
  api: {
    imf: {
      provider: 'IMF',
      siteUrl: 'https://www.imf.org',
      baseUrl: env.IMF_API_BASE_URL ?? 'https://www.imf.org/external/datamapper/api/v1',
      timeoutMs: env.IMF_TIMEOUT_MS ?? 15000,
      requestDelayMs: env.IMF_REQUEST_DELAY_MS ?? 500,
    },
  },
  cache: {
    defaultTTL: 3600, // 1 hour
  },
  selection: {
    minYear: 1990,
    defaultCountries: ['MEX', 'USA', 'BRA'],
    defaultStartYear: 2010,
    defaultEndYear: 2023,
  },
  footer: {
    dataLagNote: 'Data may lag by up to 6 months depending on the indicator',
  },
} as const
