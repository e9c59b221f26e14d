/**
 * Configuracion centralizada del generador de reportes.
 *
 * npm ejecuta los scripts de workspace dentro de `apps/reporte_evaluacion`;
 * el directorio desde donde se invoco queda en `INIT_CWD`. Tanto el `.env`
 * como los renders se buscan ahi, no junto al codigo (ni en `dist/`).
 */
import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { ErrorAplicacion } from './compartido/errores/errorAplicacion';

export function resolverDirectorioInvocacion(env: NodeJS.ProcessEnv = process.env) {
  const initCwd = String(env.INIT_CWD ?? '').trim();
  return path.resolve(initCwd || process.cwd());
}

export function rutaArchivoEnv(env: NodeJS.ProcessEnv = process.env) {
  return path.join(resolverDirectorioInvocacion(env), '.env');
}

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({
  quiet: true,
  path: rutaArchivoEnv()
});

const esquemaEntorno = z.object({
  REPORTE_DIRECTORIO: z.string().trim().min(1).optional(),
  // Solo nombre de archivo: el reporte siempre vive junto a las imagenes.
  REPORTE_ARCHIVO: z
    .string()
    .trim()
    .regex(/^[^/\\]+\.tex$/)
    .default('report.tex'),
  // El logger lo lee directo de process.env; aqui solo se valida.
  LOG_SILENCIOSO: z.enum(['0', '1']).default('0')
});

export type Configuracion = {
  directorioTrabajo: string;
  archivoReporte: string;
};

export function cargarConfiguracion(env: NodeJS.ProcessEnv = process.env): Configuracion {
  const resultado = esquemaEntorno.safeParse(env);
  if (!resultado.success) {
    throw new ErrorAplicacion('CONFIGURACION_INVALIDA', 'Variables de entorno invalidas', 1, resultado.error.flatten());
  }
  const datos = resultado.data;
  return {
    // Un REPORTE_DIRECTORIO relativo se toma respecto al directorio de invocacion.
    directorioTrabajo: path.resolve(resolverDirectorioInvocacion(env), datos.REPORTE_DIRECTORIO ?? '.'),
    archivoReporte: datos.REPORTE_ARCHIVO
  };
}
