/**
 * Project file errors.
 */
import type { z } from 'zod'


/**
 * The project file cannot be read, parsed or written.
 */
export class ProjectFileError extends Error {

    override readonly name = 'ProjectFileError' as const

    constructor(
        message: string,
        public readonly path: string,
        public override readonly cause?: Error,
    ) {

        super(message)
    }
}


/**
 * The project file violates its schema.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => project.load())
 * if (err instanceof ProjectValidationError) {
 *     console.error(`${err.field}: ${err.message}`)
 * }
 * ```
 */
export class ProjectValidationError extends Error {

    override readonly name = 'ProjectValidationError' as const

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message)
    }
}
