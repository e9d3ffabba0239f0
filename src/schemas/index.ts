export { FindEntryInputSchema, WalkDirectoryInputSchema } from './inputs.js';

// Output schemas
export {
  FindEntryOutputSchema,
  ListAllowedDirectoriesOutputSchema,
  WalkDirectoryOutputSchema,
} from './outputs.js';
