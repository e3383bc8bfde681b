/**
 * Phases that need the privilege gate: the admin check up front and the
 * Windows Defender exclusions.
 */

import { SetupError } from "../errors";
import { definePhase, PhaseDefinition } from "../pipeline";
import { psQuote } from "../platform/elevation";

export function checkPrivilegesPhase(): PhaseDefinition {
  return definePhase(
    "check-privileges",
    { required: true, dryRunSafe: true },
    async (ctx, scope) => {
      if (ctx.settings.skipAdmin) {
        scope.skip("--skip-admin");
        return;
      }

      await ctx.gate.withFeatureFallback(
        "windows_admin",
        async () => {
          if (await ctx.gate.hasElevatedRights()) {
            scope.record("Running with administrator privileges");
            return;
          }
          const message =
            "Administrator privileges are required. Re-run from an elevated terminal or pass --skip-admin.";
          if (ctx.dryRun) {
            scope.warn(message);
            return;
          }
          throw new SetupError(message, "permanent", "PERMISSION_ERROR");
        },
        (reason) => {
          scope.warn(`Administrator check skipped: ${reason}`);
        },
      );
    },
  );
}

export function defenderExclusionCommand(target: string): string {
  return `Add-MpPreference -ExclusionPath ${psQuote(target)}`;
}

export function securityExclusionsPhase(): PhaseDefinition {
  return definePhase(
    "security-exclusions",
    { required: false, dryRunSafe: false },
    async (ctx, scope) => {
      if (ctx.settings.skipSecurity) {
        scope.skip("--skip-security");
        return;
      }

      const { coreDir, tempDir } = ctx.settings.paths;
      const targets = [coreDir, tempDir];

      await ctx.gate.withFeatureFallback(
        "windows_defender",
        async () => {
          for (const target of targets) {
            if (ctx.dryRun) {
              scope.record(`Add Windows Defender exclusion for ${target}`);
              continue;
            }
            await scope.retry(`Defender exclusion for ${target}`, async () => {
              const result = await ctx.gate.runElevated(
                {
                  file: "powershell",
                  args: ["-NoProfile", "-Command", defenderExclusionCommand(target)],
                  label: `Defender exclusion for ${target}`,
                },
                ctx.settings.timeoutMs,
                ctx.signal,
              );
              if (!result.success) {
                throw (
                  result.error ??
                  new SetupError(result.message, "permanent", "PERMISSION_ERROR")
                );
              }
            });
            scope.record(`Added Windows Defender exclusion for ${target}`);
          }
        },
        (reason) => {
          scope.warn(
            `Windows Defender exclusions were not configured (${reason}). ` +
              "You may need to configure your antivirus software manually.",
          );
        },
      );
    },
  );
}
