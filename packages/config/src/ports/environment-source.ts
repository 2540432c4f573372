/**
 * Where hub connection variables come from: the process environment or a
 * dotenv file next to the agent.
 *
 * Sources are read in order; a later source overrides an earlier one.
 */
export interface EnvironmentSource {
  /** e.g. "env", "dotenv:/etc/hostmon/hostmon.env" */
  readonly name: string

  /** Variables that are set. An unset variable is absent, never `undefined`. */
  load(): Promise<Record<string, string>>
}
