export { Task, interpolateOnly, type TaskConfig, type TaskInputs, type TaskInputValue } from './task.js';
export { TaskOutput, type OutputFormat, type TaskOutputInit } from './task-output.js';
