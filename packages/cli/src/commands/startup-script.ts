import { GatewayConfigSchema, buildStartupScript } from "@tunnelgate/core";
import { printError } from "../utils/output";

export interface StartupScriptOptions {
  gatewayPort?: string;
}

/**
 * Print the boot script `deploy` installs, without touching any project.
 */
export async function startupScript(options: StartupScriptOptions): Promise<void> {
  try {
    const gateway = GatewayConfigSchema.parse(
      options.gatewayPort !== undefined ? { port: options.gatewayPort } : {}
    );
    process.stdout.write(buildStartupScript({ gateway }));
  } catch (error: unknown) {
    printError(error);
    process.exit(1);
  }
}
