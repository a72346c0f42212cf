// Distinguished-name helpers
// Every lab object lives directly under one target location, so DNs are built as CN=<name>,<location>.

import { LabError } from "../models/errors.ts";

/** corp.example.com -> DC=corp,DC=example,DC=com */
export function domainToDN(domain: string): string {
  const labels = domain.trim().replace(/\.$/, "").split(".");
  if (labels.some((label) => !/^[A-Za-z0-9-]+$/.test(label))) {
    throw new LabError("InvalidArgument", `Invalid DNS domain name: "${domain}"`);
  }
  return labels.map((label) => `DC=${label}`).join(",");
}

/** Default container for new users and groups in an Active Directory domain */
export function defaultUserContainer(domain: string): string {
  return `CN=Users,${domainToDN(domain)}`;
}

/** RFC 4514 attribute-value escaping */
export function escapeDNValue(value: string): string {
  const escaped = value.replace(/[,+"\\<>;=]/g, (ch) => `\\${ch}`);
  const lead = /^[ #]/.test(escaped) ? "\\" : "";
  const body = escaped.length > 1 && escaped.endsWith(" ") ? `${escaped.slice(0, -1)}\\ ` : escaped;
  return lead + body;
}

export function childDN(name: string, parent: string): string {
  return `CN=${escapeDNValue(name)},${parent}`;
}

export function normalizeDN(dn: string): string {
  return dn.trim().replace(/\s*([,=])\s*/g, "$1").toLowerCase();
}

export function dnEquals(a: string, b: string): boolean {
  return normalizeDN(a) === normalizeDN(b);
}

export function isWithin(dn: string, ancestor: string): boolean {
  const child = normalizeDN(dn);
  const parent = normalizeDN(ancestor);
  return child === parent || child.endsWith(`,${parent}`);
}

export function validateDN(dn: string): boolean {
  if (dn.trim() === "") return false;

  // Simple validation: every component needs a non-empty type and value
  const components = dn.split(/(?<!\\),/).map((c) => c.trim());
  for (const component of components) {
    if (!component.includes("=") || component.startsWith("=") || component.endsWith("=")) {
      return false;
    }
  }
  return true;
}
