/*
 Title: camera
 Description: Orbit camera as an immutable value. Eye position comes from spherical coordinates
 around the target; the view transform is the inverse of a lookAt world matrix.
*/
import { MathUtils, Matrix4, Spherical, Vector3 } from "three";
import type { Vec3Tuple } from "mol-mesh";

export const PITCH_LIMIT = Math.PI / 2 - 0.01;

export interface Camera {
  readonly yaw: number;
  readonly pitch: number;
  readonly distance: number;
  readonly pan: { readonly x: number; readonly y: number };
  readonly target: Readonly<Vec3Tuple>;
  readonly minDistance: number;
  readonly maxDistance: number;
}

export interface CameraOptions {
  target?: Vec3Tuple;
  yaw?: number;
  pitch?: number;
  distance?: number;
  pan?: { x: number; y: number };
  minDistance?: number;
  maxDistance?: number;
}

export function wrapYaw(yaw: number): number {
  const twoPi = Math.PI * 2;
  let y = yaw % twoPi;
  if (y <= -Math.PI) y += twoPi;
  else if (y > Math.PI) y -= twoPi;
  return y;
}

function normalize(cam: Camera): Camera {
  return {
    ...cam,
    yaw: wrapYaw(cam.yaw),
    pitch: MathUtils.clamp(cam.pitch, -PITCH_LIMIT, PITCH_LIMIT),
    distance: MathUtils.clamp(cam.distance, cam.minDistance, cam.maxDistance),
  };
}

export function createCamera(opts: CameraOptions = {}): Camera {
  const { target = [0, 0, 0], yaw = 0, pitch = 0, distance = 1, pan = { x: 0, y: 0 } } = opts;
  const minDistance = Math.max(1e-6, opts.minDistance ?? 0.05);
  const maxDistance = Math.max(minDistance, opts.maxDistance ?? 10);
  return normalize({ yaw, pitch, distance, pan: { ...pan }, target: [...target], minDistance, maxDistance });
}

export function orbit(cam: Camera, dYaw: number, dPitch: number): Camera {
  return normalize({ ...cam, yaw: cam.yaw + dYaw, pitch: cam.pitch + dPitch });
}

export function panBy(cam: Camera, dx: number, dy: number): Camera {
  return { ...cam, pan: { x: cam.pan.x + dx, y: cam.pan.y + dy } };
}

export function zoomBy(cam: Camera, delta: number): Camera {
  return normalize({ ...cam, distance: cam.distance + delta });
}

/** Fresh copy of `initial`; nothing of the current camera carries over. */
export function resetCamera(initial: Camera): Camera {
  return { ...initial, pan: { ...initial.pan }, target: [...initial.target] };
}

export function cameraEquals(a: Camera, b: Camera): boolean {
  return (
    a.yaw === b.yaw &&
    a.pitch === b.pitch &&
    a.distance === b.distance &&
    a.pan.x === b.pan.x &&
    a.pan.y === b.pan.y &&
    a.target[0] === b.target[0] &&
    a.target[1] === b.target[1] &&
    a.target[2] === b.target[2] &&
    a.minDistance === b.minDistance &&
    a.maxDistance === b.maxDistance
  );
}

export function eyePosition(cam: Camera): Vector3 {
  const [tx, ty, tz] = cam.target;
  return new Vector3()
    .setFromSpherical(new Spherical(cam.distance, Math.PI / 2 - cam.pitch, cam.yaw))
    .add(new Vector3(tx, ty, tz));
}

/** World → camera transform. The camera looks down its −Z axis, so depth is −z. */
export function viewMatrix(cam: Camera): Matrix4 {
  const [tx, ty, tz] = cam.target;
  const eye = eyePosition(cam);
  return new Matrix4()
    .lookAt(eye, new Vector3(tx, ty, tz), new Vector3(0, 1, 0))
    .setPosition(eye)
    .invert();
}
