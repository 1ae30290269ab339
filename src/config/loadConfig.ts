import { readFile } from 'fs/promises'
import { existsSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import YAML from 'yaml'
import {
  AppError,
  createLogger,
  err,
  fromThrowable,
  mapErr,
  ok,
  type Result,
} from '../shared/index.js'
import { configSchema, outputFormatSchema, type Config } from './schema.js'

const logger = createLogger('config')

export const CONFIG_FILENAME = '.lcp.yaml'

let cachedConfig: Config | null = null

const EMPTY: Result<Record<string, unknown>, AppError> = ok({})

/**
 * 查找配置文件路径（全局 + 项目）
 * 全局配置为基底，项目配置覆盖其上
 */
function findConfigPaths(cwd?: string): { globalPath: string | null; projectPath: string | null } {
  const homePath = join(homedir(), CONFIG_FILENAME)
  const projectDir = cwd || process.cwd()
  const projectPath = join(projectDir, CONFIG_FILENAME)

  // 项目目录与 home 目录相同时，不重复加载
  const isHomeCwd = projectDir === homedir()

  return {
    globalPath: existsSync(homePath) ? homePath : null,
    projectPath: !isHomeCwd && existsSync(projectPath) ? projectPath : null,
  }
}

/**
 * 加载 CLI 配置
 * 查找顺序：项目目录 → ~/.lcp.yaml → 默认配置，最后叠加环境变量
 * 配置文件有误时打印警告并回退到默认配置
 */
export async function loadConfig(options: { cwd?: string } = {}): Promise<Config> {
  if (cachedConfig) return cachedConfig

  const { globalPath, projectPath } = findConfigPaths(options.cwd)

  if (!globalPath && !projectPath) {
    cachedConfig = applyEnvOverrides(getDefaultConfig())
    return cachedConfig
  }

  const globalRaw = globalPath ? await parseYamlFile(globalPath) : EMPTY
  const projectRaw = projectPath ? await parseYamlFile(projectPath) : EMPTY
  if (!globalRaw.ok) return fallbackToDefaults(globalRaw.error)
  if (!projectRaw.ok) return fallbackToDefaults(projectRaw.error)

  const merged = mergeConfig(globalRaw.value, projectRaw.value)
  logger.debug(`Loaded config from ${[globalPath, projectPath].filter(Boolean).join(', ')}`)

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    const reason = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    return fallbackToDefaults(AppError.configInvalid(reason))
  }

  cachedConfig = applyEnvOverrides(result.data)
  return cachedConfig
}

function fallbackToDefaults(error: AppError): Config {
  logger.warn(`${error.message}, using defaults`)
  cachedConfig = applyEnvOverrides(getDefaultConfig())
  return cachedConfig
}

/**
 * 解析 YAML 文件；空文件或只有注释时返回空对象
 */
async function parseYamlFile(filePath: string): Promise<Result<Record<string, unknown>, AppError>> {
  const content = await readFile(filePath, 'utf-8')
  const parsed = mapErr(
    fromThrowable((): unknown => YAML.parse(content)),
    e => AppError.configInvalid(`${filePath}: ${e.message}`, e)
  )
  if (!parsed.ok) return parsed

  const value = parsed.value
  if (value === null || value === undefined) return ok({})
  if (!isPlainObject(value)) {
    return err(AppError.configInvalid(`${filePath}: top level must be a mapping`))
  }
  return ok(value)
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * 浅合并：项目配置字段覆盖全局配置，null/undefined 不覆盖
 */
function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val !== undefined && val !== null) result[key] = val
  }
  return result
}

/**
 * 叠加环境变量（在 schema 校验之后执行）
 * LCP_FORMAT 只接受 text/json，其他值忽略
 */
export function applyEnvOverrides(config: Config): Config {
  const env = process.env

  if (env.LCP_PLACEHOLDER) {
    config = { ...config, placeholder: env.LCP_PLACEHOLDER }
  }

  if (env.LCP_FORMAT) {
    const format = outputFormatSchema.safeParse(env.LCP_FORMAT)
    if (format.success) {
      config = { ...config, format: format.data }
    } else {
      logger.warn(`Ignoring LCP_FORMAT=${env.LCP_FORMAT} (expected text or json)`)
    }
  }

  return config
}

/**
 * 获取默认配置
 */
export function getDefaultConfig(): Config {
  return {
    placeholder: '<empty>',
    format: 'text',
  }
}

/**
 * 清除配置缓存
 */
export function clearConfigCache(): void {
  cachedConfig = null
}
