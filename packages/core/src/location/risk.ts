import { Gazetteer } from './Gazetteer';
import { RiskLevel } from './types';

/**
 * Geographic distance category between the declared and the authoritative
 * location. Only meaningful for a detected conflict.
 */
export function classifyRisk(
  gazetteer: Gazetteer,
  metadataLocation: string,
  authoritativeLocation: string,
  conflictDetected: boolean
): RiskLevel {
  if (!conflictDetected) {
    return 'none';
  }

  const declared = gazetteer.normalize(metadataLocation);
  const actual = gazetteer.normalize(authoritativeLocation);

  if (declared.country === undefined || actual.country === undefined) {
    return 'high';
  }
  if (declared.country !== actual.country) {
    return 'critical';
  }
  if (declared.state !== undefined && actual.state !== undefined && declared.state !== actual.state) {
    return 'medium';
  }
  return 'low';
}
