import type { InteractionResult } from "@webpilot/schemas";
import { AutomationError, toErrorPayload } from "@webpilot/schemas";
import { resolveCommand } from "@webpilot/resolver";
import type { ActionExecutor } from "@webpilot/executor";

export interface CommandOutcome {
  command: string;
  result: InteractionResult;
}

export interface RunOptions {
  /** Continue after a failed command instead of stopping. */
  keepGoing?: boolean;
  includeBase64?: boolean;
  onResult?: (outcome: CommandOutcome) => void;
}

/**
 * Resolve and execute commands in order against one executor. Commands that
 * do not resolve count as failures.
 */
export async function runCommands(
  executor: ActionExecutor,
  commands: readonly string[],
  options: RunOptions = {},
): Promise<CommandOutcome[]> {
  const outcomes: CommandOutcome[] = [];
  for (const command of commands) {
    let result: InteractionResult;
    try {
      const intent = resolveCommand(command);
      result = await executor.execute(intent, { include_base64: options.includeBase64 ?? false });
    } catch (err) {
      if (!(err instanceof AutomationError)) throw err;
      const error = toErrorPayload(err);
      result = { success: false, message: error.message, data: {}, error };
    }
    const outcome = { command, result };
    outcomes.push(outcome);
    options.onResult?.(outcome);
    if (!result.success && !options.keepGoing) break;
  }
  return outcomes;
}
