/**
 * Catalog Entry Types
 *
 * An Entry is a topic a learner can start a session on. It fixes the domain,
 * the learning objective (its title), the cast of roles, and a short set of
 * diagnostic questions shown when the session starts.
 */

export interface QuizQuestion {
  id: string;
  prompt: string;
  options: string[];
}

export interface DiagnoseSet {
  questions: QuizQuestion[];
}

export interface Entry {
  entryId: string;
  domain: string;
  /** Used as the session's main objective */
  title: string;
  subtitle: string;
  description: string;
  keywords: string[];
  /** Everyday image substituted for {metaphor} in beat templates */
  metaphor?: string;
  /** Roles cast in sessions for this entry */
  roles: string[];
  diagnose: DiagnoseSet;
}
