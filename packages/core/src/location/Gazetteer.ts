import * as fs from 'fs';
import { z } from 'zod';
import defaultTables from '../../config/gazetteer.json';
import { ConfigValidationError, describeError, formatZodErrors } from '../errors';
import { Logger } from '../utils/logger';

const AliasesSchema = z.array(z.string().min(1)).default([]);

const CountrySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  continent: z.string().min(1),
  aliases: AliasesSchema,
  structuredAliases: AliasesSchema,
});

const RegionSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  country: z.string().min(1),
  aliases: AliasesSchema,
  structuredAliases: AliasesSchema,
});

const CitySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  region: z.string().min(1).optional(),
  country: z.string().min(1),
  aliases: AliasesSchema,
  structuredAliases: AliasesSchema,
});

export const GazetteerDataSchema = z
  .object({
    countries: z.array(CountrySchema).min(1),
    regions: z.array(RegionSchema).default([]),
    cities: z.array(CitySchema).default([]),
  })
  .superRefine((data, ctx) => {
    const countries = new Set(data.countries.map(c => c.key));
    const regionCountry = new Map(data.regions.map(r => [r.key, r.country] as const));

    data.regions.forEach((region, i) => {
      if (!countries.has(region.country)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['regions', i, 'country'],
          message: `Unknown country "${region.country}"`,
        });
      }
    });
    data.cities.forEach((city, i) => {
      if (!countries.has(city.country)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['cities', i, 'country'],
          message: `Unknown country "${city.country}"`,
        });
      }
      if (city.region !== undefined && regionCountry.get(city.region) !== city.country) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['cities', i, 'region'],
          message: `Region "${city.region}" does not exist in country "${city.country}"`,
        });
      }
    });
  });

export type GazetteerData = z.infer<typeof GazetteerDataSchema>;
export type CountryEntry = z.infer<typeof CountrySchema>;
export type RegionEntry = z.infer<typeof RegionSchema>;
export type CityEntry = z.infer<typeof CitySchema>;

/**
 * Canonical keys; any subset may be absent
 */
export interface NormalizedLocation {
  readonly city?: string;
  readonly state?: string;
  readonly country?: string;
}

export interface LocationMentions {
  /** Distinct city keys in order of first mention */
  readonly cities: readonly string[];
  readonly states: readonly string[];
  readonly countries: readonly string[];
  readonly cityCounts: Readonly<Record<string, number>>;
  /** Offset of each city's first mention in the folded text */
  readonly firstIndex: Readonly<Record<string, number>>;
}

interface Hit {
  readonly key: string;
  readonly index: number;
  readonly end: number;
}

interface AliasMatcher {
  readonly pattern: RegExp;
  readonly keyByAlias: ReadonlyMap<string, string>;
}

interface MatcherSet {
  readonly city: AliasMatcher;
  readonly region: AliasMatcher;
  readonly country: AliasMatcher;
}

const SUFFIXES: readonly RegExp[] = [
  /\s*\(main\)/g,
  /\s*\/\s*main\b/g,
  /\s+am main\b/g,
  /\s+upon\s+[\p{L}-]+/gu,
  /\s+city\b/g,
];

const PLACE_CUES =
  /(?:[Bb]ased in|[Ll]ocated in|[Oo]ffices? in|[Hh]eadquartered in|[Ww]ork(?:ing)? (?:from|in)|[Ll]ocation:|[Ss]tandort:|[Aa]rbeitsort:|[Ee]insatzort:|[Ss]itz in)\s+(\p{Lu}[\p{L}'-]*(?:\s+\p{Lu}[\p{L}'-]*)?)/gu;

const NOT_PLACES = new Set([
  'the', 'our', 'your', 'a', 'an', 'this', 'one', 'all', 'remote', 'hybrid', 'home',
  'europe', 'emea', 'dach', 'asia', 'apac',
]);

/**
 * Case, diacritic and whitespace folding used for every comparison
 */
export function foldText(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/ß/g, 'ss')
    .replace(/\s+/g, ' ')
    .trim();
}

function stripSuffixes(folded: string): string {
  return SUFFIXES.reduce((text, suffix) => text.replace(suffix, ''), folded).trim();
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildMatcher(entries: ReadonlyArray<{ key: string; aliases: readonly string[] }>): AliasMatcher {
  const keyByAlias = new Map<string, string>();
  for (const entry of entries) {
    for (const alias of entry.aliases) {
      const folded = foldText(alias);
      if (folded && !keyByAlias.has(folded)) {
        keyByAlias.set(folded, entry.key);
      }
    }
  }

  // longest alias first so "frankfurt am main" wins over "frankfurt"
  const alternatives = [...keyByAlias.keys()].sort((a, b) => b.length - a.length).map(escapeRegExp);
  const body = alternatives.length > 0 ? alternatives.join('|') : '(?!)';
  return {
    pattern: new RegExp(`(?<![\\p{L}\\p{N}])(?:${body})(?![\\p{L}\\p{N}])`, 'gu'),
    keyByAlias,
  };
}

function scan(matcher: AliasMatcher, folded: string): Hit[] {
  const hits: Hit[] = [];
  for (const match of folded.matchAll(matcher.pattern)) {
    const key = matcher.keyByAlias.get(match[0]);
    const index = match.index ?? 0;
    if (key !== undefined) {
      hits.push({ key, index, end: index + match[0].length });
    }
  }
  return hits;
}

function overlaps(a: Hit, b: Hit): boolean {
  return a.index < b.end && b.index < a.end;
}

function distinct(hits: readonly Hit[]): string[] {
  return [...new Set(hits.map(hit => hit.key))];
}

let defaultInstance: Gazetteer | undefined;

/**
 * Read-only tables of cities, regions and countries with alias lookup.
 *
 * Free text is matched on whole words only; country codes and other short
 * "structured" aliases (DE, US, NSW) are honoured only when normalizing a
 * location string such as "60311 Frankfurt, DE".
 */
export class Gazetteer {
  private readonly cities: ReadonlyMap<string, CityEntry>;
  private readonly regions: ReadonlyMap<string, RegionEntry>;
  private readonly countries: ReadonlyMap<string, CountryEntry>;
  private readonly freeText: MatcherSet;
  private readonly structured: MatcherSet;

  private constructor(data: GazetteerData) {
    this.cities = new Map(data.cities.map(c => [c.key, Object.freeze(c)] as const));
    this.regions = new Map(data.regions.map(r => [r.key, Object.freeze(r)] as const));
    this.countries = new Map(data.countries.map(c => [c.key, Object.freeze(c)] as const));

    // display names resolve to their own entry, unless the name is a structured-only alias ("Essen")
    const withName = <T extends { key: string; name: string; aliases: string[]; structuredAliases: string[] }>(
      entries: T[]
    ) =>
      entries.map(e => {
        const structuredOnly = e.structuredAliases.map(foldText).includes(foldText(e.name));
        return { key: e.key, aliases: structuredOnly ? [...e.aliases] : [...e.aliases, e.name] };
      });
    const withStructured = <T extends { key: string; name: string; aliases: string[]; structuredAliases: string[] }>(
      entries: T[]
    ) => entries.map(e => ({ key: e.key, aliases: [...e.aliases, e.name, ...e.structuredAliases] }));

    this.freeText = {
      city: buildMatcher(withName(data.cities)),
      region: buildMatcher(withName(data.regions)),
      country: buildMatcher(withName(data.countries)),
    };
    this.structured = {
      city: buildMatcher(withStructured(data.cities)),
      region: buildMatcher(withStructured(data.regions)),
      country: buildMatcher(withStructured(data.countries)),
    };
  }

  /**
   * Validate raw tables; throws ConfigValidationError on schema or reference errors
   */
  static fromData(raw: unknown, source: string = 'gazetteer'): Gazetteer {
    const parsed = GazetteerDataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigValidationError(source, formatZodErrors(parsed.error));
    }
    return new Gazetteer(parsed.data);
  }

  static load(filePath: string): Gazetteer {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigValidationError(filePath, [
        { path: 'root', message: `Failed to read gazetteer: ${describeError(error)}` },
      ]);
    }
    const gazetteer = Gazetteer.fromData(raw, filePath);
    Logger.info(`[Gazetteer] ✓ Loaded ${gazetteer.cities.size} cities from ${filePath}`);
    return gazetteer;
  }

  /**
   * Bundled tables, validated once per process
   */
  static default(): Gazetteer {
    if (!defaultInstance) {
      defaultInstance = Gazetteer.fromData(defaultTables, 'config/gazetteer.json');
    }
    return defaultInstance;
  }

  city(key: string): CityEntry | undefined {
    return this.cities.get(key);
  }

  region(key: string): RegionEntry | undefined {
    return this.regions.get(key);
  }

  country(key: string): CountryEntry | undefined {
    return this.countries.get(key);
  }

  /**
   * Parse a structured location string ("Frankfurt am Main, Hessen, DE").
   *
   * A recognized city fills its region and country unless the string names a
   * different country.
   */
  normalize(text: string): NormalizedLocation {
    const folded = stripSuffixes(foldText(text));
    if (folded.length === 0) {
      return {};
    }

    const cityHit: Hit | undefined = scan(this.structured.city, folded)[0];
    const outsideCity = (hit: Hit) => cityHit === undefined || !overlaps(hit, cityHit);
    const regionHit = scan(this.structured.region, folded).find(outsideCity);
    const countryHit = scan(this.structured.country, folded).find(outsideCity);

    let state = regionHit?.key;
    let country = countryHit?.key;
    const city = cityHit ? this.cities.get(cityHit.key) : undefined;

    if (city) {
      country = country ?? city.country;
      if (state === undefined && city.region !== undefined && country === city.country) {
        state = city.region;
      }
    }
    if (state !== undefined && country === undefined) {
      country = this.regions.get(state)?.country;
    }

    return {
      ...(city ? { city: city.key } : {}),
      ...(state !== undefined ? { state } : {}),
      ...(country !== undefined ? { country } : {}),
    };
  }

  /**
   * Display form, e.g. "Frankfurt am Main, Hesse, Germany"
   */
  format(location: NormalizedLocation): string {
    const parts = [
      location.city !== undefined ? this.cities.get(location.city)?.name : undefined,
      location.state !== undefined ? this.regions.get(location.state)?.name : undefined,
      location.country !== undefined ? this.countries.get(location.country)?.name : undefined,
    ];
    return parts.filter((part): part is string => part !== undefined).join(', ');
  }

  /**
   * "Pune, India": city display name plus its country
   */
  describe(cityKey: string): string | undefined {
    const city = this.cities.get(cityKey);
    if (!city) {
      return undefined;
    }
    const country = this.countries.get(city.country);
    return country ? `${city.name}, ${country.name}` : city.name;
  }

  extractMentions(text: string): LocationMentions {
    const folded = foldText(text);
    const cityHits = scan(this.freeText.city, folded);

    const cityCounts: Record<string, number> = {};
    const firstIndex: Record<string, number> = {};
    for (const hit of cityHits) {
      cityCounts[hit.key] = (cityCounts[hit.key] ?? 0) + 1;
      if (firstIndex[hit.key] === undefined) {
        firstIndex[hit.key] = hit.index;
      }
    }

    return {
      cities: distinct(cityHits),
      states: distinct(scan(this.freeText.region, folded)),
      countries: distinct(scan(this.freeText.country, folded)),
      cityCounts,
      firstIndex,
    };
  }

  /**
   * Capitalized names after location cues ("based in", "Standort:") that the
   * tables do not know
   */
  findUnknownPlaces(text: string): string[] {
    const unknown = new Set<string>();
    for (const match of text.matchAll(PLACE_CUES)) {
      const candidate = match[1].trim();
      const folded = foldText(candidate);
      const firstWord = folded.split(' ')[0];
      if (NOT_PLACES.has(firstWord) || this.isKnown(folded)) {
        continue;
      }
      unknown.add(candidate);
    }
    return [...unknown];
  }

  /**
   * Whether claim `b` names the same place as `a`: the same city when both
   * have one, otherwise the same folded string or a normalized location that
   * `a` already contains ("Deutschland" within "Germany" or "Munich, Germany").
   */
  sameCity(a: string, b: string): boolean {
    const left = this.normalize(a);
    const right = this.normalize(b);
    if (left.city !== undefined && right.city !== undefined) {
      return left.city === right.city;
    }
    const foldedA = stripSuffixes(foldText(a));
    if (foldedA.length > 0 && foldedA === stripSuffixes(foldText(b))) {
      return true;
    }
    const fields = (['city', 'state', 'country'] as const).filter(field => right[field] !== undefined);
    return fields.length > 0 && fields.every(field => left[field] === right[field]);
  }

  private isKnown(folded: string): boolean {
    return (
      scan(this.structured.city, folded).length > 0 ||
      scan(this.structured.region, folded).length > 0 ||
      scan(this.structured.country, folded).length > 0
    );
  }
}
