import type { User } from "../../core/entities/user.entity.js";
import { type AppError, userNotFound } from "../../core/errors/app-error.js";
import { ensureNotBlank } from "../../core/errors/argument-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { toUserId } from "../../core/types/brand.js";
import { type Result, err } from "../../core/types/result.js";
import type { Caller } from "./caller.js";
import type { PermissionService } from "./permission.service.js";

/**
 * One permission-gated operation on a single user:
 * authorize → look up → precondition → mutate.
 */
export interface GuardedMutation<T> {
  /** Name used in logs */
  readonly name: string;
  /** Error when the target does not exist; USER_NOT_FOUND by default */
  readonly onMissing?: (() => AppError) | undefined;
  /** Business precondition on the loaded target; return an error to stop */
  readonly precondition?: ((user: User) => AppError | null | Promise<AppError | null>) | undefined;
  readonly mutate: (user: User) => Promise<Result<T, AppError>>;
}

export type GuardedMutationRunner = <T>(
  caller: Caller,
  targetUserId: string | null | undefined,
  mutation: GuardedMutation<T>,
) => Promise<Result<T, AppError>>;

interface Deps {
  readonly permissions: PermissionService;
  readonly userRepo: UserRepository;
  readonly logger: Logger;
}

/**
 * A blank target id throws ArgumentError before anything else runs.
 * A denied caller gets FORBIDDEN without learning whether the target
 * exists.
 */
export const createGuardedMutationRunner = (deps: Deps): GuardedMutationRunner => {
  const { permissions, userRepo, logger } = deps;

  return <T>(
    caller: Caller,
    targetUserId: string | null | undefined,
    mutation: GuardedMutation<T>,
  ): Promise<Result<T, AppError>> => {
    ensureNotBlank(targetUserId, "id");
    const id = targetUserId;

    const run = async (): Promise<Result<T, AppError>> => {
      const allowed = await permissions.authorize(caller, id);
      if (!allowed.ok) return allowed;

      const found = await userRepo.findById(toUserId(id));
      if (!found.ok) {
        if (found.error.code === "NOT_FOUND") {
          logger.debug(`${mutation.name}: target not found`, { userId: id });
          return err(mutation.onMissing ? mutation.onMissing() : userNotFound());
        }
        return found;
      }

      if (mutation.precondition) {
        const refused = await mutation.precondition(found.value);
        if (refused !== null) {
          logger.debug(`${mutation.name}: precondition failed`, {
            userId: id,
            reason: refused.reason,
          });
          return err(refused);
        }
      }

      return mutation.mutate(found.value);
    };

    return run();
  };
};
