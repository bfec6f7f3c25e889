// SPDX-License-Identifier: LGPL-3.0-or-later
// SPDX-FileCopyrightText: © 2025 David Osipov <personal@david-osipov.vision>

/**
 * Provides utilities for detecting the application environment.
 * @module
 */

export type AppEnvironment = "development" | "production";

export const environment = (() => {
  const cache = new Map<string, boolean>();
  let explicitEnvironment: AppEnvironment | undefined;

  return {
    setExplicitEnv(environment_: AppEnvironment): void {
      explicitEnvironment = environment_;
      cache.clear();
    },
    get isDevelopment(): boolean {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "development";
      const cached = cache.get("isDevelopment");
      if (cached !== undefined) return cached;

      // Authoritative: NODE_ENV if present (case-insensitive)
      const nodeEnvironment =
        typeof process !== "undefined" ? process.env["NODE_ENV"] : undefined;
      const value = nodeEnvironment?.trim().toLowerCase();
      const result = value === "development" || value === "test";
      cache.set("isDevelopment", result);
      return result;
    },
    get isProduction(): boolean {
      if (explicitEnvironment !== undefined)
        return explicitEnvironment === "production";
      // Reference the exported object so the getter survives extraction.
      return !environment.isDevelopment;
    },
    clearCache(): void {
      explicitEnvironment = undefined;
      cache.clear();
    },
  };
})();

/**
 * Returns `true` if the current environment is determined to be 'development'.
 */
export function isDevelopment(): boolean {
  return environment.isDevelopment;
}
