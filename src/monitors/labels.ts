/**
 * Hostname extraction from Traefik router labels
 */
import type { ContainerLabels } from '../types/index.js';

const ROUTER_LABEL_PREFIX = 'traefik.http.routers.';
const RULE_LABEL_SUFFIX = '.rule';

// Host(`app.example.com`), whitespace allowed inside the parentheses
const HOST_RULE_PATTERN = /Host\(\s*`([^`]+)`\s*\)/g;

export function isRouterRuleLabel(key: string): boolean {
  return key.includes(ROUTER_LABEL_PREFIX) && key.includes(RULE_LABEL_SUFFIX);
}

/**
 * Extract every Host(`...`) argument from a Traefik rule
 */
export function extractHostsFromRule(rule: string): string[] {
  const hosts: string[] = [];
  for (const match of rule.matchAll(HOST_RULE_PATTERN)) {
    const host = match[1];
    if (host) {
      hosts.push(host);
    }
  }
  return hosts;
}

/**
 * Collect hostnames from all router rule labels of a container.
 * Order follows the labels, duplicates are kept and nothing is validated.
 */
export function extractHostsFromLabels(labels: ContainerLabels): string[] {
  const hosts: string[] = [];

  for (const [key, value] of Object.entries(labels)) {
    if (isRouterRuleLabel(key)) {
      hosts.push(...extractHostsFromRule(value));
    }
  }

  return hosts;
}
