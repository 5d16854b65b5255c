import { BaseError } from "@keel/errors"

export class ShutdownHookError extends BaseError<"shutdown_hook"> {
  get hook(): string {
    return String(this.context.hook)
  }
}
