import { listActiveEnrollments, resolveIdentity } from "../deadlines/pipeline.js";
import { Tool, textResult } from "./types.js";

export const listActiveCoursesTool: Tool = {
  name: "list-active-courses",
  description: "List the courses the authenticated user is actively enrolled in",
  inputSchema: { type: "object", properties: {}, required: [] },
  execute: async (_args, { client, config }) => {
    const identity = await resolveIdentity(client);
    const courses = await listActiveEnrollments(client, identity, config.pageSize);
    const formattedCourses = courses
      .map(course => `- ${course.name} [ID: ${course.id}]`)
      .join("\n");
    return textResult(
      formattedCourses ? `Active Courses:\n\n${formattedCourses}` : "No active courses found."
    );
  }
};
