/**
 * state-invoker - Operation Module
 */

export {
  Operation,
  Get,
  GetCollection,
  Post,
  Put,
  Patch,
  Delete,
} from './Operation';

export type { HttpMethod, OperationOptions } from './Operation';
