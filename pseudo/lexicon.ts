/**
 * Word lists for surrogate synthesis, loaded once from pseudo/data/
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const NamesSchema = z.object({
  given: z.array(z.string().min(1)).min(1),
  surnames: z.array(z.string().min(1)).min(1),
  orgWords: z.array(z.string().min(1)).min(1),
  bankWords: z.array(z.string().min(1)).min(1),
});

const PlacesSchema = z.object({
  streets: z.array(z.string().min(1)).min(1),
  suffixes: z.array(z.string().min(1)).min(1),
  longSuffixes: z.array(z.string().min(1)).min(1),
  cities: z.array(z.object({ city: z.string().min(1), state: z.string().length(2) })).min(1),
  states: z.array(z.string().length(2)).min(1),
  stateNames: z.array(z.string().min(1)).min(1),
  majorCities: z.array(z.string().min(1)).min(1),
});

export type NameLexicon = z.infer<typeof NamesSchema>;
export type PlaceLexicon = z.infer<typeof PlacesSchema>;

function loadJson<T>(file: string, schema: z.ZodType<T>): T {
  const raw: unknown = JSON.parse(readFileSync(new URL(`./data/${file}`, import.meta.url), "utf-8"));
  return schema.parse(raw);
}

let names: NameLexicon | null = null;
let places: PlaceLexicon | null = null;

export function nameLexicon(): NameLexicon {
  if (!names) names = loadJson("names.json", NamesSchema);
  return names;
}

export function placeLexicon(): PlaceLexicon {
  if (!places) places = loadJson("places.json", PlacesSchema);
  return places;
}
