import type { IdDeriver } from "../ports/id-generator"
import type { IdType } from "./id-type"

export type DerivedIdCodec<T> = IdType<T> & IdDeriver<T>

export const withDeriver = <T>(t: IdType<T>, d: IdDeriver<T>): DerivedIdCodec<T> => ({
  ...t,
  ...d,
})
