import { readFileSync, rmSync, writeFileSync } from "node:fs";
import type { StateStorage } from "zustand/middleware";
import { createLogger } from "../../lib/logger";
import { errorMessage } from "../../lib/errors";

const log = createLogger("budget");

export function memoryStorage(initial: Record<string, string> = {}): StateStorage {
    const items = new Map(Object.entries(initial));
    return {
        getItem: (name) => items.get(name) ?? null,
        setItem: (name, value) => {
            items.set(name, value);
        },
        removeItem: (name) => {
            items.delete(name);
        },
    };
}

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Keeps the whole persisted budget in one JSON file. The key name is ignored:
 * one file holds one store.
 */
export function fileStorage(filePath: string): StateStorage {
    return {
        getItem: () => {
            try {
                return readFileSync(filePath, "utf8");
            } catch (e) {
                if (isMissingFile(e)) return null;
                throw e;
            }
        },
        setItem: (_name, value) => {
            try {
                writeFileSync(filePath, value, "utf8");
            } catch (e) {
                log.error(`Could not save usage file ${filePath}: ${errorMessage(e)}`);
            }
        },
        removeItem: () => {
            rmSync(filePath, { force: true });
        },
    };
}
