import { z } from 'zod'
import { SEARCH_ENGINES } from '../browser/driver'
import type { ExtractOutcome, FormFillOutcome, PageVisit } from '../browser/driver'
import type { TableData } from '../scrape/table'

// ---------------------------------------------------------------------------
// Request bodies, one schema per dispatchable action
// ---------------------------------------------------------------------------

const instanceId = z.string().trim().min(1, 'instance_id is required')

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((u) => /^https?:\/\//i.test(u), 'must be an http or https URL')

const formValue = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v))

/** A plain file name: no directory part, no leading dot. */
const screenshotName = z
  .string()
  .trim()
  .min(1)
  .max(200)
  .refine((n) => !/[\\/]/.test(n) && !n.startsWith('.'), 'must be a plain file name')

export const commandSchemas = {
  navigate: z.object({
    instance_id: instanceId,
    url: httpUrl,
  }),
  search: z.object({
    instance_id: instanceId,
    search_engine: z.enum(SEARCH_ENGINES).default('google'),
    query: z.string().trim().min(1, 'query is required'),
  }),
  'fill-form': z.object({
    instance_id: instanceId,
    form_url: httpUrl,
    form_data: z
      .record(z.string().min(1), formValue)
      .refine((d) => Object.keys(d).length > 0, 'form_data must contain at least one field'),
    submit_selector: z.string().trim().min(1).optional(),
  }),
  extract: z.object({
    instance_id: instanceId,
    selectors: z
      .record(z.string().min(1), z.string().trim().min(1))
      .refine((s) => Object.keys(s).length > 0, 'selectors must contain at least one entry'),
  }),
  screenshot: z.object({
    instance_id: instanceId,
    filename: screenshotName.optional(),
  }),
  'scrape-table': z.object({
    instance_id: instanceId,
    table_selector: z.string().trim().min(1).default('table'),
  }),
}

export type CommandName = keyof typeof commandSchemas

export type CommandMap = { [K in CommandName]: z.output<(typeof commandSchemas)[K]> }

export interface ScreenshotOutcome {
  filename: string
  path: string
}

export interface PayloadMap {
  navigate: PageVisit
  search: PageVisit
  'fill-form': FormFillOutcome
  extract: ExtractOutcome
  screenshot: ScreenshotOutcome
  'scrape-table': TableData
}
