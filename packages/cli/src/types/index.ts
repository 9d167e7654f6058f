export type {
  SelectionCommandOptions,
  RunCommandOptions,
  DiscoverCommandOptions,
} from './command-options';
export type { BaseCommandOptions, ICommand, ICompleteCommand } from '../interfaces/command';
