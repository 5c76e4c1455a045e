/**
 * Dotenv store: the project's `.env` file.
 *
 * Reads through dotenv's parser. Writes drop the setting's entries,
 * multi-line quoted values included, and keep comments and unrelated
 * variables in place.
 */
import { access, mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import dotenv from 'dotenv'
import { attempt } from '@logosdx/utils'

import { StoreNotSupportedError } from '../errors.js'
import { SettingValueStore } from '../store.js'
import { SettingsStoreManager } from './base.js'
import type { SettingDefinition } from '../definition.js'
import type { StoreGetResult, StoreSetMetadata } from '../types.js'


/**
 * One assignment, spanning every line of a quoted value. Follows the
 * assignment grammar of dotenv's parser, with whitespace around the
 * entry kept on its own lines.
 */
const ENTRY_PATTERN = /^[ \t]*(?:export[ \t]+)?([\w.-]+)(?:[ \t]*=[ \t]*|:[ \t]+)(?:'(?:\\'|[^'])*'|"(?:\\"|[^"])*"|`(?:\\`|[^`])*`|[^#\r\n]*)[ \t]*(?:#[^\r\n]*)?$/


/**
 * Quote a value so dotenv parses it back unchanged.
 *
 * dotenv expands `\n` and `\r` inside double quotes and has no escape for
 * an inner `"`, so a value holding both other quote kinds as well cannot
 * be written.
 *
 * @throws StoreNotSupportedError if no quoting reads back unchanged
 *
 * @example
 * ```typescript
 * quoteDotenvValue('plain')        // 'plain'
 * quoteDotenvValue('has space')    // "'has space'"
 * quoteDotenvValue("it's")         // '`it\'s`'
 * ```
 */
export function quoteDotenvValue(value: string): string {

    if (/^[\w./:@+-]*$/.test(value)) {

        return value
    }

    if (!value.includes("'")) {

        return `'${value}'`
    }

    if (!value.includes('`')) {

        return `\`${value}\``
    }

    if (value.includes('"') || /\\[nr]/.test(value)) {

        throw new StoreNotSupportedError(
            SettingValueStore.DOTENV,
            'value mixes every quote kind with a double quote or a \\n escape',
        )
    }

    return `"${value}"`
}


/**
 * Remove every entry assigning one of `keys`, with its line break.
 */
function dropDotenvEntries(content: string, keys: ReadonlySet<string>): string {

    const normalized = content.replace(/\r\n?/g, '\n')
    const pattern = new RegExp(ENTRY_PATTERN.source, 'gm')

    let kept = ''
    let cursor = 0
    let match: RegExpExecArray | null

    while ((match = pattern.exec(normalized)) !== null) {

        const key = match[1]

        if (!key || !keys.has(key)) {

            continue
        }

        const end = match.index + match[0].length

        kept += normalized.slice(cursor, match.index)
        cursor = normalized[end] === '\n' ? end + 1 : end
    }

    return kept + normalized.slice(cursor)
}


export class DotenvStoreManager extends SettingsStoreManager {

    readonly store = SettingValueStore.DOTENV

    #values: Record<string, string> | null = null

    async get(name: string, setting: SettingDefinition | null): Promise<StoreGetResult> {

        const def = this.requireSetting(name, setting)
        const values = await this.#loadValues()

        for (const envVar of this.service.settingEnvVars(def)) {

            const value = envVar.get(values)

            if (value !== undefined) {

                return { value, metadata: { envVar: envVar.key } }
            }
        }

        return { value: undefined, metadata: {} }
    }

    async set(
        name: string,
        path: readonly string[],
        value: unknown,
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        const def = this.requireSetting(name, setting)
        const envVars = this.service.settingEnvVars(def)
        const [primary] = envVars

        if (!primary) {

            throw new StoreNotSupportedError(this.store, `setting '${def.name}' has no env vars`)
        }

        const line = `${primary.key}=${quoteDotenvValue(def.stringifyValue(value))}\n`
        const kept = dropDotenvEntries(await this.#readContent(), new Set(envVars.map((envVar) => envVar.key)))
        const separator = kept === '' || kept.endsWith('\n') ? '' : '\n'

        await this.#writeContent(`${kept}${separator}${line}`)

        return { envVar: primary.key }
    }

    async unset(
        name: string,
        path: readonly string[],
        setting: SettingDefinition | null,
    ): Promise<StoreSetMetadata> {

        this.assertWritable()

        const def = this.requireSetting(name, setting)
        const keys = new Set(this.service.settingEnvVars(def).map((envVar) => envVar.key))

        await this.#writeContent(dropDotenvEntries(await this.#readContent(), keys))

        return {}
    }

    async reset(): Promise<StoreSetMetadata> {

        this.assertWritable()

        const path = this.#path()
        const [, err] = await attempt(() => rm(path, { force: true }))

        if (err) {

            throw new Error(`Failed to remove ${path}: ${err.message}`)
        }

        this.#values = null

        return {}
    }

    #path(): string {

        const path = this.service.dotenvPath

        if (!path) {

            throw new StoreNotSupportedError(this.store, 'no .env file is configured')
        }

        return path
    }

    async #loadValues(): Promise<Record<string, string>> {

        if (this.bulk && this.#values) {

            return this.#values
        }

        const content = await this.#readContent()
        const values = dotenv.parse(content)

        if (this.bulk) {

            this.#values = values
        }

        return values
    }

    async #readContent(): Promise<string> {

        const path = this.#path()
        const [, missing] = await attempt(() => access(path))

        if (missing) {

            return ''
        }

        const [content, readErr] = await attempt(() => readFile(path, 'utf-8'))

        if (readErr) {

            throw new Error(`Failed to read ${path}: ${readErr.message}`)
        }

        return content
    }

    async #writeContent(content: string): Promise<void> {

        const path = this.#path()

        const [, mkdirErr] = await attempt(() => mkdir(dirname(path), { recursive: true }))

        if (mkdirErr) {

            throw new Error(`Failed to create directory for ${path}: ${mkdirErr.message}`)
        }

        const [, writeErr] = await attempt(() => writeFile(path, content, 'utf-8'))

        if (writeErr) {

            throw new Error(`Failed to write ${path}: ${writeErr.message}`)
        }

        this.#values = null
    }
}
