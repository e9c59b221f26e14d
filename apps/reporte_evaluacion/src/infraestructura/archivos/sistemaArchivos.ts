/**
 * Acceso a disco del generador (existencia de rutas y escritura del reporte).
 */
import fs from 'node:fs/promises';

async function estadoRuta(ruta: string) {
  try {
    return await fs.stat(ruta);
  } catch (error) {
    const codigo = error instanceof Error && 'code' in error ? error.code : undefined;
    if (codigo === 'ENOENT' || codigo === 'ENOTDIR') return null;
    throw error;
  }
}

export async function existeDirectorio(ruta: string) {
  const estado = await estadoRuta(ruta);
  return Boolean(estado?.isDirectory());
}

export async function existeArchivo(ruta: string) {
  const estado = await estadoRuta(ruta);
  return Boolean(estado?.isFile());
}

export async function escribirTexto(ruta: string, contenido: string) {
  await fs.writeFile(ruta, contenido, 'utf8');
  return ruta;
}
