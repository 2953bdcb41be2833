export class AlreadyBorrowedError extends Error {
  name = "AlreadyBorrowedError";
}

export class NonReentrantBackwardError extends Error {
  name = "NonReentrantBackwardError";
}

export class MissingBackwardRuleError extends Error {
  name = "MissingBackwardRuleError";
}

export class PoisonedArenaError extends Error {
  name = "PoisonedArenaError";
}

export class StaleHandleError extends Error {
  name = "StaleHandleError";
}

export class ArenaMismatchError extends Error {
  name = "ArenaMismatchError";
}

export class ArenaExhaustedError extends Error {
  name = "ArenaExhaustedError";
}

export class ModeLockedError extends Error {
  name = "ModeLockedError";
}

export class SharedModeRequiredError extends Error {
  name = "SharedModeRequiredError";
}
