import { z } from 'zod'

/** 输出格式：text 直接打印前缀，json 打印 {"prefix","count"} */
export const outputFormatSchema = z.enum(['text', 'json'])

export const configSchema = z.object({
  /** 公共前缀为空时打印的占位符 */
  placeholder: z.string().min(1).default('<empty>'),
  format: outputFormatSchema.default('text'),
})

export type OutputFormat = z.infer<typeof outputFormatSchema>
export type Config = z.infer<typeof configSchema>
