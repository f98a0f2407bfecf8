// ---------------------------------------------------------------------------
// Built-in illustrative dataset, shown when no real data could be loaded.
// ---------------------------------------------------------------------------

import type { Dataset, InscriptionRecord } from "../../core/types.js";
import { createDataset } from "./dataset.js";

const SAMPLE_COLUMNS = [
  "person_id",
  "name",
  "gender",
  "age_category",
  "year",
  "case",
  "inscription_type",
] as const;

const SAMPLE_ROWS: InscriptionRecord[] = [
  { person_id: 1, name: "Marcus Aurelius", gender: "Male", age_category: "Adult", year: 120, case: "Nominative", inscription_type: "Funerary" },
  { person_id: 2, name: "Julia Felix", gender: "Female", age_category: "Adult", year: 150, case: "Genitive", inscription_type: "Honorary" },
  { person_id: 3, name: "Gaius Julius", gender: "Male", age_category: "Child", year: 80, case: "Accusative", inscription_type: "Votive" },
  { person_id: 4, name: "Claudia Severa", gender: "Female", age_category: "Adult", year: 200, case: "Dative", inscription_type: "Funerary" },
  { person_id: 5, name: "Titus Flavius", gender: "Male", age_category: "Elder", year: 170, case: "Nominative", inscription_type: "Building" },
  { person_id: 6, name: "Cornelia Prima", gender: "Female", age_category: "Adult", year: 140, case: "Ablative", inscription_type: "Funerary" },
  { person_id: 7, name: "Lucius Vorenus", gender: "Male", age_category: "Adult", year: 90, case: "Nominative", inscription_type: "Military" },
  { person_id: 8, name: "Antonia Minor", gender: "Female", age_category: "Elder", year: 180, case: "Genitive", inscription_type: "Honorary" },
  { person_id: 9, name: "Quintus Sertorius", gender: "Male", age_category: "Adult", year: 110, case: "Dative", inscription_type: "Votive" },
  { person_id: 10, name: "Livia Drusilla", gender: "Female", age_category: "Adult", year: 160, case: "Nominative", inscription_type: "Funerary" },
];

/** Ten made-up inscriptions covering every well-known column. */
export function sampleDataset(): Dataset {
  return createDataset(SAMPLE_COLUMNS, SAMPLE_ROWS);
}
