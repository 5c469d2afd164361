import { z } from "zod"

export const LanguageSchema = z.enum(["EN", "FR"])

export const GameModeSchema = z.enum(["ai", "pass-and-play"])

export const LogLevelSchema = z.enum([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
])

/** Hangman dictionary: secret word to hint. */
export const WordListSchema = z
  .record(
    z.string().regex(/^[A-Z]+$/, "Words must be upper-case letters only"),
    z.string().min(1),
  )
  .refine((words) => Object.keys(words).length > 0, "Word list is empty")

/** @see https://zod.dev/codecs#jsonschema */
export const zJsonCodec = <T extends z.core.$ZodType>(schema: T) =>
  z.codec(z.string(), schema, {
    decode: (jsonString, ctx) => {
      try {
        return JSON.parse(jsonString)
      } catch (err) {
        ctx.issues.push({
          code: "invalid_format",
          format: "json",
          input: jsonString,
          message: err instanceof Error ? err.message : String(err),
        })
        return z.NEVER
      }
    },
    encode: (value) => JSON.stringify(value),
  })
