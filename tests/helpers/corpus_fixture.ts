import { createMemoryCorpusDatabase } from "../../src/db/connection.js";
import { createCorpusSchema, rebuildSearchIndex } from "../../src/db/migrate.js";
import { incidents } from "../../src/db/schema.js";
import type { NewIncidentRow } from "../../src/db/schema.js";
import { SqliteIncidentCorpus } from "../../src/corpus/sqlite_corpus.js";
import type { IncidentRecord } from "../../src/shared/types.js";

export type IncidentSeed = Partial<NewIncidentRow> & { id: number };

/**
 * Small construction corpus. Outcome codes: 1 fatal, 2 days away,
 * 3 job transfer, 4 other recordable.
 */
export const SAMPLE_INCIDENTS: IncidentSeed[] = [
  {
    id: 1,
    incidentOutcome: 1,
    yearFilingFor: 2022,
    narWhatHappened: "Worker fell from a ladder while painting the stairwell",
    eventTitlePred: "Fall to lower level",
    sourceTitlePred: "Ladders",
    natureTitlePred: "Fractures",
    partTitlePred: "Head",
  },
  {
    id: 2,
    incidentOutcome: 2,
    dafwNumAway: 45,
    yearFilingFor: 2023,
    narWhatHappened: "Employee slipped off a scaffold plank",
    eventTitlePred: "Fall to lower level",
    sourceTitlePred: "Scaffolds",
    natureTitlePred: "Sprains",
    partTitlePred: "Back",
  },
  {
    id: 3,
    incidentOutcome: 1,
    yearFilingFor: 2023,
    narWhatHappened: "Boom touched an overhead line and the operator was electrocuted",
    eventTitlePred: "Direct exposure to electricity",
    sourceTitlePred: "Power lines",
    natureTitlePred: "Electrocutions",
    partTitlePred: "Body systems",
  },
  {
    id: 4,
    incidentOutcome: 2,
    dafwNumAway: 10,
    yearFilingFor: 2023,
    narWhatHappened: "Hammer dropped from above and struck worker on the shoulder",
    eventTitlePred: "Struck by swinging object",
    sourceTitlePred: "Hand tools",
    natureTitlePred: "Bruises",
    partTitlePred: "Shoulder",
  },
  {
    id: 5,
    incidentOutcome: 3,
    djtrNumTr: 12,
    yearFilingFor: 2021,
    narWhatHappened: "Glove caught in mixer drum",
    eventTitlePred: "Caught in running equipment",
    sourceTitlePred: "Concrete mixers",
    natureTitlePred: "Amputations",
    partTitlePred: "Fingers",
  },
  {
    id: 6,
    incidentOutcome: 4,
    yearFilingFor: 2022,
    narWhatHappened: "Splash of cleaning chemical to the eyes",
    eventTitlePred: "Exposure to caustic substance",
    sourceTitlePred: "Chemical products",
    natureTitlePred: "Chemical burns",
    partTitlePred: "Eyes",
  },
  {
    id: 7,
    incidentOutcome: 2,
    dafwNumAway: 3,
    yearFilingFor: 2022,
    narWhatHappened: "Tripped over a hose on the walkway",
    eventTitlePred: "Fall on same level due to slip",
    sourceTitlePred: "Floors",
    natureTitlePred: "Sprains",
    partTitlePred: "Knee",
  },
  {
    id: 8,
    incidentOutcome: 2,
    dafwNumAway: 60,
    yearFilingFor: 2023,
    narWhatHappened: 'The "roof" was marked as safe but the deck collapsed',
    eventTitlePred: "Fall through surface",
    sourceTitlePred: "Roof decks",
    natureTitlePred: "Fractures",
    partTitlePred: "Legs",
  },
];

/** In-memory corpus holding `rows`, with the full-text index built. */
export function buildCorpus(rows: IncidentSeed[] = SAMPLE_INCIDENTS): SqliteIncidentCorpus {
  const connection = createMemoryCorpusDatabase();
  createCorpusSchema(connection.db);
  if (rows.length > 0) {
    connection.db
      .insert(incidents)
      .values(rows.map((row) => ({ naicsCode: "236220", ...row })))
      .run();
  }
  rebuildSearchIndex(connection.db);
  return new SqliteIncidentCorpus(connection);
}

/** Bare record for fakes; everything not given is null or zero. */
export function makeRecord(overrides: Partial<IncidentRecord> & { id: number }): IncidentRecord {
  return {
    establishmentName: null,
    city: null,
    state: null,
    naicsCode: "236220",
    industryDescription: null,
    yearFilingFor: null,
    dateOfIncident: null,
    outcome: "unknown",
    daysAway: 0,
    jobTransferDays: 0,
    typeOfIncident: null,
    jobDescription: null,
    whatHappened: null,
    beforeIncident: null,
    location: null,
    injuryIllness: null,
    objectSubstance: null,
    incidentDescription: null,
    natureOfInjury: null,
    bodyPart: null,
    eventType: null,
    source: null,
    secondarySource: null,
    ...overrides,
  };
}
