import { readFile } from "node:fs/promises"

import type { z } from "zod"

import type { LanguageSchema } from "../schemas.ts"
import { WordListSchema, zJsonCodec } from "../schemas.ts"

export type Language = z.infer<typeof LanguageSchema>
export type WordList = z.infer<typeof WordListSchema>

const FILES: Record<Language, URL> = {
  EN: new URL("../../data/hangman/en.json", import.meta.url),
  FR: new URL("../../data/hangman/fr.json", import.meta.url),
}

const wordListCodec = zJsonCodec(WordListSchema)

export function parseWordList(json: string, source = "word list"): WordList {
  const res = wordListCodec.safeDecode(json)
  if (!res.success) {
    throw new Error(
      `Invalid ${source}: ${res.error.issues.map((i) => i.message).join("; ")}`,
    )
  }
  return res.data
}

export async function loadWordList(language: Language): Promise<WordList> {
  const file = FILES[language]
  return parseWordList(await readFile(file, "utf8"), file.pathname)
}
