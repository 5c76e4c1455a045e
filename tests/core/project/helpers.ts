/**
 * Temporary project directories for project and settings variant tests.
 */
import { mkdtempSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';

export interface TempProject {
    root: string;
    path: (...segments: string[]) => string;
    cleanup: () => void;
}

/**
 * Create a project directory, optionally with a `strata.yml`.
 */
export function createTempProject(projectYaml?: string): TempProject {

    const root = mkdtempSync(join(process.cwd(), 'tmp', 'strata-project-test-'));

    if (projectYaml !== undefined) {

        writeFileSync(join(root, 'strata.yml'), projectYaml);

    }

    return {
        root,
        path: (...segments) => join(root, ...segments),
        cleanup: () => {

            if (existsSync(root)) {

                rmSync(root, { recursive: true });

            }

        },
    };

}
