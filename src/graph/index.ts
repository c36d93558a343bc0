// Types (re-export as types)
export type {
  Task,
  TasksDocument,
  BlockedTask,
  TaskGraphErrorType,
  ValidationError,
  GraphProgress,
} from "./types.js";

// Errors
export { TaskGraphError } from "./errors.js";

// Schemas (re-export values)
export { taskSchema, tasksDocumentSchema } from "./schemas.js";

// Graph
export { TaskGraph } from "./graph.js";

// Validator
export {
  findValidationError,
  findDuplicateId,
  findDanglingEdge,
  detectCycle,
  eliminate,
} from "./validator.js";

// Query
export {
  findTask,
  findReady,
  findBlocked,
  findIncomplete,
  findCompleted,
  summarize,
} from "./query.js";

// Parallel groups
export {
  tasksByGroup,
  incompleteTasksByGroup,
  nextParallelGroup,
  compileParallelGroups,
} from "./groups.js";

// Reader
export {
  loadTasksFile,
  readTasksDocument,
  buildTaskGraph,
  parseTasksDocument,
  TasksFileError,
} from "./reader.js";

// Writer
export { writeTasksFile, updateTaskCompletion } from "./writer.js";
