/**
 * Generador del reporte de evaluacion.
 *
 * Flujo:
 * 1) Resuelve la entrega (falla antes de producir cualquier salida si no existe).
 * 2) Detecta la ruta de referencia (Vulkan/OpenGL) por las carpetas del proyecto.
 * 3) Por cada vista del plan y cada pose: calcula `diff_<archivo>` y agrega la figura.
 * 4) Escribe el `.tex` una sola vez, con el documento ya completo.
 *
 * Las imagenes se procesan en secuencia; cualquier falla de E/S aborta la corrida.
 */
import path from 'node:path';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { escribirTexto, existeArchivo, existeDirectorio } from '../../infraestructura/archivos/sistemaArchivos';
import { calcularDiferenciaAbsoluta, calcularDiferenciaSinAlumno } from '../../infraestructura/imagenes/diferenciaImagen';
import { log } from '../../infraestructura/logging/logger';
import { resolverEntrega, type NumeroTarea } from './domain/catalogoEntregas';
import {
  DocumentoLatex,
  IMAGEN_SUSTITUTA,
  MENSAJE_ARCHIVOS_FALTANTES,
  MENSAJE_COMPARACION,
  MENSAJE_RUTA_INDEFINIDA
} from './domain/documentoLatex';
import {
  nombreArchivoDiferencia,
  nombreArchivoImagen,
  resolverPlanVistas,
  resolverPosesCamara
} from './domain/planVistas';
import { detectarRutaReferencia, type VerificadorDirectorio } from './seleccionReferencia';

export type DependenciasReporte = {
  existeArchivo: (ruta: string) => Promise<boolean>;
  existeDirectorio: VerificadorDirectorio;
  calcularDiferencia: (rutaAlumno: string, rutaReferencia: string, rutaSalida: string) => Promise<unknown>;
  calcularDiferenciaSinAlumno: (rutaReferencia: string, rutaSalida: string) => Promise<unknown>;
  escribirTexto: (ruta: string, contenido: string) => Promise<unknown>;
};

export type OpcionesReporte = {
  claveEntrega: string;
  directorioTrabajo: string;
  archivoReporte?: string;
  dependencias?: Partial<DependenciasReporte>;
};

export type ResumenReporte = {
  tarea: NumeroTarea;
  nombreTarea: string;
  rutaReferencia: string;
  rutaDecidida: boolean;
  rutaReporte: string;
  figuras: number;
  faltantes: string[];
};

const dependenciasPorDefecto: DependenciasReporte = {
  existeArchivo,
  existeDirectorio,
  calcularDiferencia: calcularDiferenciaAbsoluta,
  calcularDiferenciaSinAlumno,
  escribirTexto
};

export async function generarReporte(opciones: OpcionesReporte): Promise<ResumenReporte> {
  const deps: DependenciasReporte = { ...dependenciasPorDefecto, ...opciones.dependencias };
  const directorio = opciones.directorioTrabajo;
  const archivoReporte = opciones.archivoReporte ?? 'report.tex';

  const entrega = resolverEntrega(opciones.claveEntrega);
  const referencia = await detectarRutaReferencia(directorio, deps.existeDirectorio);
  const poses = resolverPosesCamara(entrega.tarea);
  const plan = resolverPlanVistas(entrega.tarea);

  const documento = new DocumentoLatex()
    .preambulo(`${entrega.nombre} Report`)
    .seccion('Results')
    .texto(MENSAJE_COMPARACION);
  if (!referencia.decidida) {
    documento.texto(MENSAJE_RUTA_INDEFINIDA);
  }

  const faltantes: string[] = [];
  let figuras = 0;

  async function procesarImagen(nombre: string) {
    const relativaReferencia = `${referencia.prefijo}${nombre}`;
    const relativaDiferencia = nombreArchivoDiferencia(nombre);
    const rutaAlumno = path.join(directorio, nombre);
    const rutaReferencia = path.join(directorio, relativaReferencia);
    const rutaDiferencia = path.join(directorio, relativaDiferencia);

    if (!(await deps.existeArchivo(rutaReferencia))) {
      throw new ErrorAplicacion(
        'IMAGEN_REFERENCIA_NO_ENCONTRADA',
        `No existe la imagen de referencia ${relativaReferencia}`,
        1,
        { ruta: rutaReferencia }
      );
    }

    if (await deps.existeArchivo(rutaAlumno)) {
      await deps.calcularDiferencia(rutaAlumno, rutaReferencia, rutaDiferencia);
      documento.figura({ alumno: nombre, referencia: relativaReferencia, diferencia: relativaDiferencia });
    } else {
      log('warn', 'Falta imagen del alumno', { archivo: nombre });
      faltantes.push(nombre);
      await deps.calcularDiferenciaSinAlumno(rutaReferencia, rutaDiferencia);
      documento
        .texto(MENSAJE_ARCHIVOS_FALTANTES)
        .figura({ alumno: IMAGEN_SUSTITUTA, referencia: relativaReferencia, diferencia: relativaDiferencia });
    }
    figuras += 1;
  }

  for (const vista of plan) {
    documento.subseccion(vista.titulo);
    for (const pose of poses) {
      await procesarImagen(nombreArchivoImagen(vista.prefijo, pose));
    }
    documento.saltoPagina();
  }

  documento.saltoPagina().cerrar();

  const rutaReporte = path.join(directorio, archivoReporte);
  await deps.escribirTexto(rutaReporte, documento.contenido());

  const resumen: ResumenReporte = {
    tarea: entrega.tarea,
    nombreTarea: entrega.nombre,
    rutaReferencia: referencia.prefijo,
    rutaDecidida: referencia.decidida,
    rutaReporte,
    figuras,
    faltantes
  };
  log('ok', 'Reporte generado', { ...resumen });
  return resumen;
}
