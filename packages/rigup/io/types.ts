import type { Result } from "@rigup/core"
import type { IoError } from "@/types/errors"

export type { IoError } from "@/types/errors"

export type IoResult<T> = Result<T, IoError>
