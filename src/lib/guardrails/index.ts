/**
 * Guardrails Module
 *
 * Safety checks applied to a resolved decision before it is spoken.
 */

export {
  checkContraindications,
  findContraindications,
  mergeWarnings,
  type ContraindicationHit,
} from "./contraindications";
