/**
 * Deteccion de la ruta de referencia (Vulkan u OpenGL) segun las carpetas del proyecto.
 */
import path from 'node:path';
import { existeDirectorio } from '../../infraestructura/archivos/sistemaArchivos';
import { log } from '../../infraestructura/logging/logger';

export const MARCADOR_VULKAN = path.join('..', '_project', 'GCGProject_VK');
export const MARCADOR_OPENGL = path.join('..', '_project', 'GCGProject_GL');

export const PREFIJO_VULKAN = 'GCG_VK/';
export const PREFIJO_OPENGL = 'GCG_GL/';

export type RutaReferencia = {
  usaVulkan: boolean;
  usaOpenGl: boolean;
  // '' cuando no se pudo decidir.
  prefijo: string;
  decidida: boolean;
};

export type VerificadorDirectorio = (ruta: string) => Promise<boolean>;

export async function detectarRutaReferencia(
  directorioTrabajo: string,
  existe: VerificadorDirectorio = existeDirectorio
): Promise<RutaReferencia> {
  const usaVulkan = await existe(path.resolve(directorioTrabajo, MARCADOR_VULKAN));
  const usaOpenGl = await existe(path.resolve(directorioTrabajo, MARCADOR_OPENGL));
  log('info', `Using Vulkan: ${usaVulkan}`, { marcador: MARCADOR_VULKAN });
  log('info', `Using OpenGL: ${usaOpenGl}`, { marcador: MARCADOR_OPENGL });

  // Si existen ambas, gana Vulkan.
  let prefijo = '';
  if (usaOpenGl) prefijo = PREFIJO_OPENGL;
  if (usaVulkan) prefijo = PREFIJO_VULKAN;

  return { usaVulkan, usaOpenGl, prefijo, decidida: usaVulkan || usaOpenGl };
}
