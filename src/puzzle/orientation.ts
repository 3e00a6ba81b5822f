import * as THREE from 'three';
import type { Axis, GearState } from './types';

// Cube frame: X to the right (toward side 5), Y to the back, Z up (toward side 1)
const AXIS_VECTORS: Record<Axis, THREE.Vector3> = {
  X: new THREE.Vector3(1, 0, 0),
  Y: new THREE.Vector3(0, 1, 0),
  Z: new THREE.Vector3(0, 0, 1)
};

export function axisVector(axis: Axis): THREE.Vector3 {
  return AXIS_VECTORS[axis].clone();
}

// Direction the reference face of the gear points to
export function facingDirection(state: GearState): THREE.Vector3 {
  return axisVector(state.position.axis).multiplyScalar(state.polarity);
}

export function describeFacing(state: GearState): string {
  const dir = facingDirection(state);
  const sign = dir.x + dir.y + dir.z > 0 ? '+' : '-';
  return `${sign}${state.position.axis}`;
}
