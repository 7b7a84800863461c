export type FieldAliasTable = Readonly<Record<string, readonly string[]>>;

export const CORE_FIELDS = ['timestamp', 'lat', 'lon', 'ele'] as const;

export type CoreField = (typeof CORE_FIELDS)[number];

/**
 * Canonical field name → source-specific names, in order of preference.
 * GPX rows use `lat`/`lon`/`ele`/`time`, FIT record messages use
 * `position_lat`/`position_long`/`altitude`/`timestamp`; togeojson reports
 * extension arrays under plural names such as `heart` and `cads`.
 */
export const FIELD_ALIASES: FieldAliasTable = deepFreeze({
  timestamp: ['timestamp', 'time', 'date_time'],
  lat: ['lat', 'latitude', 'position_lat'],
  lon: ['lon', 'lng', 'long', 'longitude', 'position_long'],
  ele: ['ele', 'elevation', 'enhanced_altitude', 'altitude', 'alt'],
  speed: ['speed', 'enhanced_speed'],
  heart_rate: ['heart_rate', 'heartrate', 'hr', 'heart'],
  cadence: ['cadence', 'cad', 'cads'],
  power: ['power', 'watts', 'powers'],
  temperature: ['temperature', 'atemp', 'atemps'],
  distance: ['distance'],
});

function deepFreeze(table: Record<string, string[]>): FieldAliasTable {
  for (const aliases of Object.values(table)) {
    Object.freeze(aliases);
  }
  return Object.freeze(table);
}

/** Reverse lookup: source name → canonical name. */
export function buildAliasIndex(table: FieldAliasTable): ReadonlyMap<string, string> {
  const index = new Map<string, string>();
  for (const [canonical, aliases] of Object.entries(table)) {
    if (!index.has(canonical)) index.set(canonical, canonical);
    for (const alias of aliases) {
      if (!index.has(alias)) index.set(alias, canonical);
    }
  }
  return index;
}

export function isCoreField(name: string): name is CoreField {
  return CORE_FIELDS.some((field) => field === name);
}
