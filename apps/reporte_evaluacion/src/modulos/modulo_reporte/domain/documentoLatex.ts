/**
 * Constructor del documento LaTeX del reporte.
 *
 * Contrato:
 * - Solo agrega texto (append-only); nada se escribe a disco desde aqui.
 * - `contenido()` devuelve el documento completo para persistirlo una sola vez.
 * - El formato (incluidos los saltos de linea ausentes tras geometry, maketitle
 *   y newpage) es el que espera la plantilla de pdflatex del curso.
 */
export const MENSAJE_COMPARACION =
  'Side-by-side comparisons: left = your solution, middle = reference image, right = absolute difference.';

export const MENSAJE_RUTA_INDEFINIDA =
  'We could not decide whether your taking the OpenGL or Vulkan Route. Please stick to the original folder names.\n';

export const MENSAJE_ARCHIVOS_FALTANTES = 'Error: Some of the necessary files do not exist.';

export const IMAGEN_SUSTITUTA = 'owl.png';

export type FiguraComparativa = {
  alumno: string;
  referencia: string;
  diferencia: string;
};

function incluirImagen(ruta: string) {
  return `\\includegraphics[width=0.3\\textwidth]{${ruta}}\n`;
}

export class DocumentoLatex {
  private readonly partes: string[] = [];
  private cerrado = false;

  private agregar(texto: string) {
    if (this.cerrado) {
      throw new Error('El documento LaTeX ya fue cerrado');
    }
    this.partes.push(texto);
    return this;
  }

  preambulo(titulo: string) {
    return this.agregar('\\documentclass{article}\n')
      .agregar('\\usepackage{graphicx}\n')
      .agregar('\\usepackage{subcaption}\n')
      .agregar('\\usepackage[a4paper, margin=1in]{geometry}')
      .agregar(`\\title{${titulo}}\n`)
      .agregar('\\begin{document}\n')
      .agregar('\\maketitle');
  }

  seccion(titulo: string) {
    return this.agregar(`\\section{${titulo}}\n`);
  }

  subseccion(titulo: string) {
    return this.agregar(`\\subsection{${titulo}}\n`);
  }

  texto(parrafo: string) {
    return this.agregar(parrafo);
  }

  figura({ alumno, referencia, diferencia }: FiguraComparativa) {
    return this.agregar(
      '\\begin{figure}[h!]\n\\centering\n' +
        incluirImagen(alumno) +
        incluirImagen(referencia) +
        incluirImagen(diferencia) +
        '\\end{figure}\n'
    );
  }

  saltoPagina() {
    return this.agregar('\\newpage');
  }

  cerrar() {
    this.agregar('\\end{document}\n');
    this.cerrado = true;
    return this;
  }

  contenido() {
    return this.partes.join('');
  }
}
