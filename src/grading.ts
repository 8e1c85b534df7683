import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import { z } from "zod";
import type { GradingApi, LiveAssignment, LiveCourse, LiveSubmission } from "./types.js";

const courseSchema = z.object({
  id: z.number(),
  name: z.string(),
  period: z.string(),
  assignments: z.array(z.number()).default([]),
});

const assignmentSchema = z.object({
  id: z.number(),
  name: z.string(),
});

const submissionSchema = z.object({
  id: z.number(),
  isFinalized: z.boolean(),
  grader: z.string().nullable().default(null),
});

export interface GradingClientOptions {
  baseURL?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

/** Read-only codePost client covering what a progress poll needs. */
export class GradingClient implements GradingApi {
  private readonly http: AxiosInstance;

  constructor(apiKey: string, options: GradingClientOptions = {}) {
    this.http = axios.create({
      baseURL: options.baseURL ?? "https://api.codepost.io",
      timeout: options.timeout ?? 30000,
      headers: { Authorization: `Token ${apiKey}` },
      adapter: options.adapter,
    });
  }

  private async get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const { data } = await this.http.get<unknown>(url);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Unexpected response from codePost ${url}: ${parsed.error.errors[0]?.message ?? "invalid"}`);
    }
    return parsed.data;
  }

  async validateApiKey(): Promise<boolean> {
    try {
      await this.http.get("/courses/");
      return true;
    } catch (err) {
      if (axios.isAxiosError(err) && (err.response?.status === 401 || err.response?.status === 403)) {
        return false;
      }
      throw err;
    }
  }

  async listAllCourses(): Promise<Array<{ id: number; name: string; period: string; assignmentIds: number[] }>> {
    const courses = await this.get("/courses/", z.array(courseSchema));
    return courses.map((c) => ({ id: c.id, name: c.name, period: c.period, assignmentIds: c.assignments }));
  }

  async getAssignment(assignmentId: number): Promise<LiveAssignment> {
    return this.get(`/assignments/${assignmentId}/`, assignmentSchema);
  }

  async listCourses(name: string, period: string): Promise<LiveCourse[]> {
    const matches = (await this.listAllCourses()).filter((c) => c.name === name && c.period === period);
    const courses: LiveCourse[] = [];
    for (const course of matches) {
      const assignments: LiveAssignment[] = [];
      for (const id of course.assignmentIds) {
        assignments.push(await this.getAssignment(id));
      }
      courses.push({ id: course.id, name: course.name, period: course.period, assignments });
    }
    return courses;
  }

  async listSubmissions(assignmentId: number): Promise<LiveSubmission[]> {
    return this.get(`/assignments/${assignmentId}/submissions/`, z.array(submissionSchema));
  }
}
