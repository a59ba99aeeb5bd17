import type { TimeoutBudget } from "@docsift/types";
import type { IExternalTool } from "../external-tool.js";
import type { ExtractionAddition, ExtractionMethod } from "../strategy.interface.js";

/** Wrap an external tool as a chain method. */
export function toolMethod(tool: IExternalTool, budget: TimeoutBudget): ExtractionMethod {
  return {
    name: tool.name,
    budget,
    run: async (input) => ({ text: await tool.run(input.data, { timeoutMs: input.timeouts[budget] }) }),
  };
}

export function toolAddition(
  tool: IExternalTool,
  heading: string,
  budget: TimeoutBudget,
  render: (output: string) => string = (output) => output,
): ExtractionAddition {
  return {
    name: tool.name,
    heading,
    budget,
    run: async (input) => render(await tool.run(input.data, { timeoutMs: input.timeouts[budget] })),
  };
}
