import { FileSystem } from "@effect/platform";
import { Effect } from "effect";

/**
 * Map-backed FileSystem holding whole files by absolute path. Directories
 * exist implicitly while a file lives under them.
 */
export function memoryFileSystem(initial: Record<string, string> = {}) {
  const files = new Map(Object.entries(initial));

  const isDirectory = (path: string) => [...files.keys()].some((file) => file.startsWith(`${path}/`));

  const layer = FileSystem.layerNoop({
    exists: (path) => Effect.sync(() => files.has(path) || isDirectory(path)),
    readFileString: (path) =>
      Effect.suspend((): Effect.Effect<string> => {
        const content = files.get(path);
        return content === undefined
          ? Effect.dieMessage(`memoryFileSystem: no file at ${path}`)
          : Effect.succeed(content);
      }),
    writeFileString: (path, data) =>
      Effect.sync(() => {
        files.set(path, data);
      }),
    readDirectory: (path) =>
      Effect.sync(() => {
        const names = new Set<string>();
        for (const file of files.keys()) {
          if (file.startsWith(`${path}/`)) {
            const [name] = file.slice(path.length + 1).split("/");
            if (name !== undefined) {
              names.add(name);
            }
          }
        }
        return [...names];
      }),
    makeDirectory: () => Effect.void,
    remove: (path) =>
      Effect.sync(() => {
        files.delete(path);
      }),
  });

  return { layer, files };
}
