import { CatalogIndex, Course, RemoteFileEntry } from "../types";

export interface Credentials {
  username: string;
  password: string;
}

export interface Session {
  username: string;
  cookie: string;
}

export interface CatalogAuthenticator {
  login(credentials: Credentials): Promise<Session>;
}

/** Read side of the remote catalog, bound to an authenticated session. */
export interface CatalogSource {
  /** Academic year label → year key. */
  listYears(): Promise<Record<string, string>>;
  listCourses(yearKey: string): Promise<Course[]>;
  listCategoryIndex(course: Course): Promise<CatalogIndex>;
  listCategoryFiles(course: Course, categoryId: string): Promise<RemoteFileEntry[]>;
}
