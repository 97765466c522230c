import { confirm } from '@inquirer/prompts'

/**
 * Yes/no question on the terminal. Enter accepts the default.
 */
export type Confirm = (message: string, defaultValue?: boolean) => Promise<boolean>

export const confirmPrompt: Confirm = (message, defaultValue = true) =>
  confirm({ message, default: defaultValue })
