import { z } from "zod";

import presets from "./data/launch-options.json";

export const launchOptionSchema = z.object({
  key: z.string().regex(/^[a-z0-9_]+$/),
  name: z.string(),
  description: z.string(),
  command: z.string().includes("%command%"),
  category: z.enum([
    "basic",
    "advanced",
    "debug",
    "experimental",
    "fsr4",
    "game_specific",
    "compatibility"
  ]),
  compatibility: z.string(),
  requirements: z.string()
});

export type LaunchOption = z.infer<typeof launchOptionSchema>;

export interface CatalogOptions {
  rdna3Workaround?: boolean;
  includeMangohud?: boolean;
}

const OVERRIDES = 'WINEDLLOVERRIDES="dxgi=n,b"';
const RDNA3_WORKAROUND = "DXIL_SPIRV_CONFIG=wmma_rdna3_workaround";

const basePresets: readonly LaunchOption[] = z
  .array(launchOptionSchema)
  .parse(presets);

function rdna3Command(command: string): string {
  let result = command.replaceAll(OVERRIDES, `${OVERRIDES} ${RDNA3_WORKAROUND}`);
  if (!result.includes("RADV_PERFTEST=")) {
    result = result.replace(
      "PROTON_FSR4_UPGRADE=1",
      "PROTON_FSR4_UPGRADE=1 RADV_PERFTEST=nggc"
    );
  } else if (!/RADV_PERFTEST=\S*nggc/.test(result)) {
    result = result.replace("RADV_PERFTEST=", "RADV_PERFTEST=nggc,");
  }
  return result;
}

function rdna3Variant(option: LaunchOption): LaunchOption {
  return {
    ...option,
    key: `${option.key}_rdna3`,
    name: `${option.name} (RDNA3)`,
    description: `${option.description} - RDNA3 GPU workaround`,
    command: rdna3Command(option.command),
    compatibility: "RDNA3 GPUs only",
    requirements: `${option.requirements}, RDNA3 GPU`
  };
}

/**
 * Launch option presets, optionally with RDNA3 variants appended and
 * MangoHUD presets left out
 */
export function getLaunchOptionsCatalog(
  options: CatalogOptions = {}
): LaunchOption[] {
  const { rdna3Workaround = false, includeMangohud = true } = options;

  let catalog = [...basePresets];
  if (rdna3Workaround) {
    catalog = catalog.concat(
      basePresets
        .filter((option) => !option.command.includes(RDNA3_WORKAROUND))
        .map(rdna3Variant)
    );
  }
  if (!includeMangohud) {
    catalog = catalog.filter((option) => !option.key.includes("mangohud"));
  }
  return catalog;
}

export function findPreset(
  key: string,
  options: CatalogOptions = {}
): LaunchOption | undefined {
  return getLaunchOptionsCatalog(options).find((option) => option.key === key);
}
