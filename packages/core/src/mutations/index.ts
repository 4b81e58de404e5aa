export {
  createMutationCoordinator,
  type MutationCoordinator,
  type MutationCoordinatorDeps,
  type CreateFolderResult,
  type MoveResult,
  type MoveMethod,
} from "./coordinator.js";
