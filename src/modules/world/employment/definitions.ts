/**
 * Job catalog.
 *
 * Payouts are whole currency units credited per successful `earn`; the
 * cooldown is measured from the citizen's last successful earn, whatever job
 * they held then.
 */
export interface JobDefinition {
  readonly kind: string;
  readonly label: string;
  readonly payout: number;
  readonly cooldownMinutes: number;
  readonly description: string;
}

export const JOB_DEFINITIONS = {
  unemployed: {
    kind: "unemployed",
    label: "Unemployed",
    payout: 20,
    cooldownMinutes: 60,
    description: "Welfare check while between jobs.",
  },
  taxi: {
    kind: "taxi",
    label: "Taxi Driver",
    payout: 100,
    cooldownMinutes: 30,
    description: "Drive passengers around the city.",
  },
  police: {
    kind: "police",
    label: "Police Officer",
    payout: 150,
    cooldownMinutes: 20,
    description: "Patrol the streets and keep the peace.",
  },
  medic: {
    kind: "medic",
    label: "Medic",
    payout: 140,
    cooldownMinutes: 25,
    description: "Answer emergency calls.",
  },
  mechanic: {
    kind: "mechanic",
    label: "Mechanic",
    payout: 120,
    cooldownMinutes: 30,
    description: "Repair and tune vehicles.",
  },
  delivery: {
    kind: "delivery",
    label: "Delivery Courier",
    payout: 90,
    cooldownMinutes: 15,
    description: "Move packages across town.",
  },
} as const satisfies Record<string, JobDefinition>;

export type JobKind = keyof typeof JOB_DEFINITIONS;

export const DEFAULT_JOB: JobKind = "unemployed";

export const isJobKind = (value: string): value is JobKind =>
  Object.hasOwn(JOB_DEFINITIONS, value);

export const getJobDefinition = (kind: string): JobDefinition | null =>
  isJobKind(kind) ? JOB_DEFINITIONS[kind] : null;

export const listJobDefinitions = (): JobDefinition[] => Object.values(JOB_DEFINITIONS);
