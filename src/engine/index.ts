/**
 * Engine Layer
 * Resistance curve and the rubber band function on doubles
 */

export * from './ResistanceEngine';
export * from './RubberBand';
