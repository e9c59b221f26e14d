/**
 * Diferencia absoluta por pixel entre dos renders (sharp).
 *
 * Ambas imagenes se decodifican como sRGB de 3 canales y 8 bits, sin alfa,
 * igual que un lector de imagenes a color; asi un PNG con alfa opaco no
 * produce una diferencia transparente.
 */
import sharp from 'sharp';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';

export type ImagenRaw = {
  data: Buffer;
  ancho: number;
  alto: number;
  canales: 1 | 2 | 3 | 4;
};

export type DimensionesImagen = Omit<ImagenRaw, 'data'>;

export async function leerImagenRgb(ruta: string): Promise<ImagenRaw> {
  try {
    const { data, info } = await sharp(ruta)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { data, ancho: info.width, alto: info.height, canales: info.channels };
  } catch (error) {
    throw new ErrorAplicacion('IMAGEN_ILEGIBLE', `No se pudo leer la imagen ${ruta}`, 1, {
      ruta,
      causa: error instanceof Error ? error.message : String(error)
    });
  }
}

export function diferenciaAbsoluta(a: ImagenRaw, b: ImagenRaw): ImagenRaw {
  if (a.ancho !== b.ancho || a.alto !== b.alto || a.canales !== b.canales) {
    throw new ErrorAplicacion(
      'IMAGEN_DIMENSIONES_DISTINTAS',
      `Dimensiones distintas: ${a.ancho}x${a.alto}x${a.canales} vs ${b.ancho}x${b.alto}x${b.canales}`,
      1,
      {
        a: { ancho: a.ancho, alto: a.alto, canales: a.canales },
        b: { ancho: b.ancho, alto: b.alto, canales: b.canales }
      }
    );
  }
  const data = Buffer.alloc(a.data.length);
  for (let i = 0; i < a.data.length; i += 1) {
    data[i] = Math.abs(a.data[i] - b.data[i]);
  }
  return { data, ancho: a.ancho, alto: a.alto, canales: a.canales };
}

export async function escribirImagenPng(imagen: ImagenRaw, rutaSalida: string): Promise<DimensionesImagen> {
  await sharp(imagen.data, {
    raw: { width: imagen.ancho, height: imagen.alto, channels: imagen.canales }
  })
    .png()
    .toFile(rutaSalida);
  return { ancho: imagen.ancho, alto: imagen.alto, canales: imagen.canales };
}

/**
 * Lee `rutaA` y `rutaB`, calcula |a - b| y lo guarda como PNG en `rutaSalida`.
 */
export async function calcularDiferenciaAbsoluta(rutaA: string, rutaB: string, rutaSalida: string) {
  const a = await leerImagenRgb(rutaA);
  const b = await leerImagenRgb(rutaB);
  return escribirImagenPng(diferenciaAbsoluta(a, b), rutaSalida);
}

/**
 * Diferencia contra un lienzo negro del tamano de la referencia (equivale a la referencia).
 * Se usa cuando falta el render del alumno para que el reporte siga compilando.
 */
export async function calcularDiferenciaSinAlumno(rutaReferencia: string, rutaSalida: string) {
  const referencia = await leerImagenRgb(rutaReferencia);
  const vacio: ImagenRaw = { ...referencia, data: Buffer.alloc(referencia.data.length) };
  return escribirImagenPng(diferenciaAbsoluta(vacio, referencia), rutaSalida);
}
