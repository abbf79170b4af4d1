/**
 * Project data module.
 */

export {
  ProjectDataScoper,
  createProjectDataScoper,
  GITIGNORE_NAME,
  GITIGNORE_CONTENT,
  type ProjectDataScoperDeps,
  type InitResult,
} from "./project-data-scoper.js";
