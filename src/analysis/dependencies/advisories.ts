/**
 * Known-vulnerable package versions, keyed by ecosystem and lowercase name.
 */

import { Ecosystem } from "../../review/types";

export interface Advisory {
  /** Affected range, e.g. "<4.17.21". */
  affected: string;
  id: string;
}

export const ADVISORIES: Record<Ecosystem, Record<string, Advisory>> = {
  npm: {
    lodash: { affected: "<4.17.21", id: "CVE-2021-23337" },
    minimist: { affected: "<1.2.6", id: "CVE-2021-44906" },
    axios: { affected: "<0.21.1", id: "CVE-2020-28168" },
    "node-fetch": { affected: "<2.6.7", id: "CVE-2022-0235" },
    jsonwebtoken: { affected: "<9.0.0", id: "CVE-2022-23529" },
  },
  pypi: {
    django: { affected: "<3.2.19", id: "CVE-2023-31047" },
    requests: { affected: "<2.31.0", id: "CVE-2023-32681" },
    pyyaml: { affected: "<5.4", id: "CVE-2020-14343" },
    flask: { affected: "<2.2.5", id: "CVE-2023-30861" },
  },
  nuget: {
    "newtonsoft.json": { affected: "<13.0.1", id: "GHSA-5crp-9r3c-p9vr" },
    "system.text.encodings.web": { affected: "<4.7.2", id: "CVE-2021-26701" },
  },
  maven: {
    "log4j-core": { affected: "<2.17.1", id: "CVE-2021-44832" },
    "jackson-databind": { affected: "<2.13.4", id: "CVE-2022-42003" },
    "spring-core": { affected: "<5.3.18", id: "CVE-2022-22965" },
  },
};

export function findAdvisory(ecosystem: Ecosystem, name: string): Advisory | undefined {
  const table = ADVISORIES[ecosystem];
  const key = name.toLowerCase();
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}
