import { Effect, Either, Schema } from "effect"
import { mkdirSync, writeFileSync } from "node:fs"
import { readFile } from "node:fs/promises"
import { dirname } from "node:path"
import { SettingsPersistError, type PetSettings, type SettingKey } from "@deskpet/shared"
import { createLogger } from "../logging/logger"
import { describeError } from "../util/error-utils"
import { InMemorySettingsStore } from "./SettingsStore"

const log = createLogger("Settings")

const StoredRecordJson = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.Unknown })
)

const decodeStoredRecord = Schema.decodeUnknownEither(StoredRecordJson)

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT"

/**
 * Settings persisted as one JSON object. Every `set` rewrites the file; a
 * failed write is logged and the in-memory value is kept.
 */
export class JsonFileSettingsStore extends InMemorySettingsStore {
  private constructor(
    readonly path: string,
    initial: Readonly<Record<string, unknown>>
  ) {
    super(initial)
  }

  /**
   * Read the file at `path`. A missing, unreadable or malformed file
   * behaves as an empty store.
   */
  static load(path: string): Effect.Effect<JsonFileSettingsStore> {
    return Effect.tryPromise({
      try: () => readFile(path, "utf8"),
      catch: (error) => error,
    }).pipe(
      Effect.map((text) =>
        Either.getOrElse(decodeStoredRecord(text), (): Readonly<Record<string, unknown>> => {
          log.warn(`Ignoring malformed settings file ${path}`)
          return {}
        })
      ),
      Effect.catchAll((error) => {
        if (isMissingFile(error)) {
          log.debug(`No settings file at ${path}, using defaults`)
        } else {
          log.warn(`Could not read settings file ${path}: ${describeError(error)}`)
        }
        return Effect.succeed<Readonly<Record<string, unknown>>>({})
      }),
      Effect.map((initial) => new JsonFileSettingsStore(path, initial))
    )
  }

  override set<K extends SettingKey>(key: K, value: PetSettings[K]): void {
    super.set(key, value)
    const written = this.flush(key)
    if (Either.isLeft(written)) {
      log.error(describeError(written.left))
    }
  }

  /** Write the whole record to disk. */
  flush(key: SettingKey | "*" = "*"): Either.Either<void, SettingsPersistError> {
    return Either.try({
      try: () => {
        mkdirSync(dirname(this.path), { recursive: true })
        writeFileSync(this.path, `${JSON.stringify(this.raw, null, 2)}\n`, "utf8")
      },
      catch: (error) => new SettingsPersistError({ key, reason: describeError(error) }),
    })
  }
}
