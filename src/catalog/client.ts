import { AppConfig } from "../config";
import { AuthError, errorMessage, FetchError } from "../core/errors";
import { defaultFetch, FetchFn, getFetchDispatcher } from "../core/fetch";
import { CatalogIndex, Course, RemoteFileEntry } from "../types";
import { parseCategoryFiles, parseCategoryIndex, parseCourses, parseYears } from "./htmlParser";
import { CatalogAuthenticator, CatalogSource, Credentials, Session } from "./types";

type ClientConfig = Pick<AppConfig, "baseUrl" | "userAgent" | "ignoreHttpsErrors" | "requestTimeoutMs">;

function endpoint(config: ClientConfig, pathname: string, params: Record<string, string> = {}): string {
  const base = config.baseUrl.endsWith("/") ? config.baseUrl : `${config.baseUrl}/`;
  const url = new URL(pathname, base);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

function courseParams(course: Course): Record<string, string> {
  return {
    year: course.year,
    period: course.semester,
    periodType: course.semesterType,
    unit: course.id,
  };
}

export class HttpCatalogAuthenticator implements CatalogAuthenticator {
  private readonly config: ClientConfig;
  private readonly fetchFn: FetchFn;

  constructor(config: ClientConfig, fetchFn: FetchFn = defaultFetch) {
    this.config = config;
    this.fetchFn = fetchFn;
  }

  async login(credentials: Credentials): Promise<Session> {
    const url = endpoint(this.config, "login");
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: {
          "user-agent": this.config.userAgent,
          "content-type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ username: credentials.username, password: credentials.password }).toString(),
        redirect: "manual",
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        signal: controller.signal,
      });

      if (response.status === 401 || response.status === 403) {
        throw new AuthError(`Login rejected for ${credentials.username}`);
      }
      if (response.status >= 400) {
        throw new FetchError(`HTTP ${response.status} while logging in`, url, response.status);
      }

      const cookie = response.headers
        .getSetCookie()
        .map((header) => header.split(";")[0].trim())
        .filter((pair) => pair.length > 0)
        .join("; ");
      if (!cookie) {
        throw new AuthError(`Login rejected for ${credentials.username}`);
      }

      return { username: credentials.username, cookie };
    } catch (error) {
      if (error instanceof AuthError || error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(`Login request failed: ${errorMessage(error)}`, url, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}

export class HttpCatalogSource implements CatalogSource {
  private readonly config: ClientConfig;
  private readonly session: Session;
  private readonly fetchFn: FetchFn;

  constructor(config: ClientConfig, session: Session, fetchFn: FetchFn = defaultFetch) {
    this.config = config;
    this.session = session;
    this.fetchFn = fetchFn;
  }

  async listYears(): Promise<Record<string, string>> {
    const url = endpoint(this.config, "years");
    return parseYears(await this.fetchHtml(url), url);
  }

  async listCourses(yearKey: string): Promise<Course[]> {
    const url = endpoint(this.config, "courses", { year: yearKey });
    return parseCourses(await this.fetchHtml(url), url);
  }

  async listCategoryIndex(course: Course): Promise<CatalogIndex> {
    const url = endpoint(this.config, "documents", courseParams(course));
    return parseCategoryIndex(await this.fetchHtml(url), url);
  }

  async listCategoryFiles(course: Course, categoryId: string): Promise<RemoteFileEntry[]> {
    const url = endpoint(this.config, "documents", { ...courseParams(course), category: categoryId });
    return parseCategoryFiles(await this.fetchHtml(url), url);
  }

  private async fetchHtml(url: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
          accept: "text/html,application/xhtml+xml",
          cookie: this.session.cookie,
        },
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new FetchError(`HTTP ${response.status} while fetching ${url}`, url, response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(`Request to ${url} failed: ${errorMessage(error)}`, url, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}
