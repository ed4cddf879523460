import { parseRecord, personSchema, projectSchema, userSchema, type Person, type Project, type User } from "./common.js";

export function toPerson(input: unknown): Person {
  return parseRecord(personSchema, input, "person").value;
}

export function toUser(input: unknown): User {
  return parseRecord(userSchema, input, "user").value;
}

export function toProject(input: unknown): Project {
  return parseRecord(projectSchema, input, "project").value;
}
