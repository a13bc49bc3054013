import { z } from 'zod'

// values[indicator][country][year] -> number | numeric string | null
export const IMFResponseSchema = z.object({
  values: z.record(z.unknown()),
})

export const IMFIndicatorSchema = z.record(z.unknown())

export const IMFSeriesSchema = z.record(z.unknown())

export type IMFSeries = z.infer<typeof IMFSeriesSchema>

export interface ObservationPoint {
  year: number
  value: number
}

/** Observations ordered by strictly increasing year. */
export type SeriesResult = ReadonlyArray<Readonly<ObservationPoint>>

export type NoticeKind = 'warning' | 'error'

export interface Notice {
  kind: NoticeKind
  message: string
}

export interface FetchSeriesOptions {
  onNotice?: (notice: Notice) => void
}

export interface SeriesFetcher {
  getSeries(
    countryApiCode: string,
    indicatorApiCode: string,
    startYear: number,
    endYear: number,
    options?: FetchSeriesOptions
  ): Promise<SeriesResult>
}
