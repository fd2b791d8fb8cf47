/**
 * Device Label Construction
 *
 * Labels are the keys the rendering layer tracks series by, so they must be
 * deterministic for the same hardware.
 */

/** Long canonical names and their short aliases, applied in order */
const AMD_NAME_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ['AMD Instinct MI210', 'MI210'],
  ['AMD MI210', 'MI210'],
  ['AMD Instinct MI250X / MI250', 'MI250'],
  ['AMD Instinct MI250X/MI250', 'MI250'],
  ['AMD Instinct MI250', 'MI250'],
  ['AMD Instinct MI300X', 'MI300X'],
  ['AMD MI300X', 'MI300X'],
  ['AMD Instinct MI300', 'MI300'],
  ['AMD MI300', 'MI300'],
  ['AMD Instinct MI325X', 'MI325X'],
  ['AMD MI325X', 'MI325X'],
];

export const AMD_LABEL_PREFIX = 'AMD';

const PCI_DOMAIN_PREFIX = '0000:';
const PCI_FUNCTION_SUFFIX = ':00.0';

export function simplifyAmdName(name: string): string {
  let clean = name.trim();
  for (const [long, short] of AMD_NAME_ALIASES) {
    clean = clean.replaceAll(long, short);
  }
  return clean;
}

/**
 * Strips the PCI domain and the function boilerplate: "0000:2f:00.0" -> "2f"
 */
export function simplifyPciSlot(slot: string): string {
  let clean = slot.trim();
  if (clean.startsWith(PCI_DOMAIN_PREFIX)) {
    clean = clean.slice(PCI_DOMAIN_PREFIX.length);
  }
  if (clean.endsWith(PCI_FUNCTION_SUFFIX)) {
    clean = clean.slice(0, -PCI_FUNCTION_SUFFIX.length);
  }
  return clean;
}

/**
 * Builds `<model>.<slot>` for a resolved model, `AMD.<card>` otherwise
 */
export function formatAmdLabel(name: string | undefined, slot: string, card: string): string {
  const cleanName = name === undefined ? '' : simplifyAmdName(name);
  if (cleanName === '' || cleanName === AMD_LABEL_PREFIX) {
    return `${AMD_LABEL_PREFIX}.${card}`;
  }
  const cleanSlot = simplifyPciSlot(slot);
  return cleanSlot !== '' ? `${cleanName}.${cleanSlot}` : cleanName;
}

/**
 * Label for backends without bus information. The index follows enumeration
 * order, so it shifts when devices are added or removed.
 */
export function ordinalLabel(name: string, index: number): string {
  return `${name}.${index}`;
}

/**
 * Appends `#2`, `#3`, ... to repeated labels so a snapshot never has two
 * devices under one key
 */
export function uniqueLabels(labels: readonly string[]): string[] {
  const used = new Set<string>();
  return labels.map((label) => {
    let candidate = label;
    for (let count = 2; used.has(candidate); count++) {
      candidate = `${label}#${count}`;
    }
    used.add(candidate);
    return candidate;
  });
}
