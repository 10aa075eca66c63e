import Matter from 'matter-js';

// Named re-exports of the matter-js namespace object.
export const { Bodies, Body, Composite, Engine } = Matter;

export type { Body as MatterBody, Engine as MatterEngine } from 'matter-js';
