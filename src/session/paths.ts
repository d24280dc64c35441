/**
 * Path resolution for client-supplied file requests.
 *
 * A request is joined onto a configured root, canonicalized (symlinks
 * included) and accepted only when the result is a readable regular file
 * strictly below the canonical root.
 */

import fs from "node:fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { Brand, Effect } from "effect";
import { InvalidPath, NotFound, NotReadable, type PathError } from "../errors.js";

/** Absolute path verified to lie inside a configured root. */
export type ResolvedPath = string & Brand.Brand<"ResolvedPath">;

const ResolvedPath = Brand.nominal<ResolvedPath>();

/** True when `child` is strictly below `parent`; both must be absolute. */
export function isWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  if (relative === "" || path.isAbsolute(relative)) return false;
  return relative.split(path.sep)[0] !== "..";
}

/** Leading separators mean "from the root", as in a URL path. */
function normalizeRequest(requested: string): string {
  return requested.replace(/^[/\\]+/, "");
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const classify = (requested: string) => (error: unknown): PathError => {
  switch (errnoCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return new NotFound({ requested });
    case "ELOOP":
      return new InvalidPath({ requested, detail: "symlink loop" });
    default:
      return new NotReadable({ requested, detail: describe(error) });
  }
};

/**
 * Resolve `requested` against `root`.
 *
 * The lexical check runs before any filesystem call, so nothing outside the
 * root is ever probed; the check repeats on the canonical path to catch
 * symlinks pointing out of the root.
 */
export const resolvePath = (
  root: string,
  requested: string
): Effect.Effect<ResolvedPath, PathError> =>
  Effect.gen(function* () {
    if (requested.includes("\0")) {
      return yield* Effect.fail(new InvalidPath({ requested, detail: "NUL byte" }));
    }
    const relative = normalizeRequest(requested);
    if (relative.trim() === "") {
      return yield* Effect.fail(new InvalidPath({ requested, detail: "empty path" }));
    }

    const canonicalRoot = yield* Effect.tryPromise({
      try: () => fs.realpath(path.resolve(root)),
      catch: classify(requested),
    });

    const joined = path.resolve(canonicalRoot, relative);
    if (!isWithin(canonicalRoot, joined)) {
      return yield* Effect.fail(new InvalidPath({ requested, detail: "outside root" }));
    }

    const canonical = yield* Effect.tryPromise({
      try: () => fs.realpath(joined),
      catch: classify(requested),
    });
    if (!isWithin(canonicalRoot, canonical)) {
      return yield* Effect.fail(
        new InvalidPath({ requested, detail: "symlink leaves root" })
      );
    }

    const stat = yield* Effect.tryPromise({
      try: () => fs.stat(canonical),
      catch: classify(requested),
    });
    if (!stat.isFile()) {
      return yield* Effect.fail(new NotReadable({ requested, detail: "not a regular file" }));
    }

    yield* Effect.tryPromise({
      try: () => fs.access(canonical, constants.R_OK),
      catch: (error) => new NotReadable({ requested, detail: describe(error) }),
    });

    return ResolvedPath(canonical);
  });

/**
 * Resolve against several roots in order. The first root holding the file
 * wins; when none does, the first root's error is reported.
 */
export const resolveInRoots = (
  roots: readonly [string, ...string[]],
  requested: string
): Effect.Effect<ResolvedPath, PathError> => {
  const [first, ...rest] = roots;
  return rest.reduce<Effect.Effect<ResolvedPath, PathError>>(
    (attempt, root) =>
      attempt.pipe(
        Effect.catchAll((error) =>
          resolvePath(root, requested).pipe(Effect.orElseFail(() => error))
        )
      ),
    resolvePath(first, requested)
  );
};
