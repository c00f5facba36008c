/**
 * UI module - spinners and prompts
 */

export type { Spinner, SpinnerServiceConfig } from './spinner-service';
export { SpinnerService, createSpinnerService } from './spinner-service';

export type { InquirerPrompterConfig } from './inquirer-prompter';
export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
