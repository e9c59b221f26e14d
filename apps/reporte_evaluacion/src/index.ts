#!/usr/bin/env node
/**
 * Punto de entrada del CLI: `reporte-evaluacion <submissionN>`.
 * Lo invoca el job de CI con el tag de la entrega.
 */
import { ErrorAplicacion, esErrorAplicacion } from './compartido/errores/errorAplicacion';
import { cargarConfiguracion } from './configuracion';
import { logError } from './infraestructura/logging/logger';
import { CLAVES_ENTREGA } from './modulos/modulo_reporte/domain/catalogoEntregas';
import { generarReporte } from './modulos/modulo_reporte/generadorReporte';

export function parsearArgumentos(argv: string[]) {
  const [claveEntrega] = argv.slice(2);
  if (!claveEntrega) {
    throw new ErrorAplicacion(
      'ARGUMENTO_FALTANTE',
      `Uso: reporte-evaluacion <${CLAVES_ENTREGA.join('|')}>`,
      1
    );
  }
  return { claveEntrega };
}

/**
 * Corre el generador completo y devuelve el exit code; los errores se registran aqui.
 */
export async function ejecutar(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  try {
    const { claveEntrega } = parsearArgumentos(argv);
    const configuracion = cargarConfiguracion(env);
    await generarReporte({
      claveEntrega,
      directorioTrabajo: configuracion.directorioTrabajo,
      archivoReporte: configuracion.archivoReporte
    });
    return 0;
  } catch (error) {
    logError('No se pudo generar el reporte', error);
    return esErrorAplicacion(error) ? error.codigoSalida : 1;
  }
}

if (require.main === module) {
  ejecutar(process.argv).then((codigo) => process.exit(codigo));
}
