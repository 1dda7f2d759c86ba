import { v7 } from "uuid"
import type { IdGenerator } from "../ports/id-generator"

/** Time-ordered UUIDs. */
export const uuidV7: IdGenerator<string> = { generate: () => v7() }
