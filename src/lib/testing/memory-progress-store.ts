import { DEFAULT_INTERACTION_LIMIT, summarizeAttempts } from "../study/progress";
import {
  Attempt,
  InteractionInput,
  InteractionRecord,
  ProgressStore,
  RegistrationResult,
  Strength,
  StudentProgress,
} from "../study/types";

/** ProgressStore held in process memory, with a clock the test can drive. */
export class MemoryProgressStore implements ProgressStore {
  readonly students = new Map<string, string>();
  readonly attempts: Attempt[] = [];
  readonly interactions: InteractionRecord[] = [];
  private tick = 0;

  constructor(private readonly now?: () => Date) {}

  async registerStudent(studentId: string, name = ""): Promise<RegistrationResult> {
    if (this.students.has(studentId)) {
      return { success: false, message: `Student ID '${studentId}' is already registered!` };
    }
    if (name && [...this.students.values()].includes(name)) {
      return { success: false, message: `Student name '${name}' is already registered!` };
    }
    this.students.set(studentId, name);
    return { success: true, message: `Student '${name}' registered successfully.` };
  }

  async recordAttempt(attempt: Omit<Attempt, "timestamp">): Promise<void> {
    this.attempts.push({ ...attempt, timestamp: this.timestamp() });
  }

  async getProgress(studentId: string): Promise<StudentProgress> {
    return summarizeAttempts(this.attempts.filter((attempt) => attempt.studentId === studentId));
  }

  async topicStrength(studentId: string, topic: string): Promise<Strength> {
    const progress = await this.getProgress(studentId);
    return progress[topic]?.strength ?? "medium";
  }

  async logInteraction(entry: InteractionInput): Promise<void> {
    this.interactions.push({ ...entry, id: `interaction-${this.interactions.length + 1}`, timestamp: this.timestamp() });
  }

  async getInteractions(studentId: string, limit = DEFAULT_INTERACTION_LIMIT): Promise<InteractionRecord[]> {
    return this.interactions
      .filter((item) => item.studentId === studentId)
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp))
      .slice(0, limit);
  }

  private timestamp(): string {
    const value = (this.now ? this.now() : new Date(Date.UTC(2024, 0, 1, 0, 0, this.tick))).toISOString();
    this.tick += 1;
    return value;
  }
}
