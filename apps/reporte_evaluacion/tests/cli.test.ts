import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ejecutar, parsearArgumentos } from '../src/index';
import { crearPng } from './utils/imagenes';

function errorRegistrado(spy: { mock: { calls: unknown[][] } }) {
  return JSON.parse(String(spy.mock.calls[0][0])).error;
}

describe('parsearArgumentos', () => {
  it('toma el primer argumento posicional como clave de entrega', () => {
    expect(parsearArgumentos(['node', 'index.js', 'submission3'])).toEqual({ claveEntrega: 'submission3' });
  });

  it('no normaliza la clave recibida', () => {
    expect(parsearArgumentos(['node', 'index.js', ' submission1 '])).toEqual({ claveEntrega: ' submission1 ' });
  });

  it('exige la clave de entrega', () => {
    expect(() => parsearArgumentos(['node', 'index.js'])).toThrow(
      'Uso: reporte-evaluacion <submission1|submission2|submission3|submission4|submission5|submission6>'
    );
  });
});

describe('ejecutar', () => {
  let raiz = '';

  afterEach(async () => {
    if (raiz) await fs.rm(raiz, { recursive: true, force: true });
    raiz = '';
  });

  it('sin argumento registra el error y devuelve 1', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await ejecutar(['node', 'index.js'], {})).toBe(1);

    expect(spy).toHaveBeenCalledTimes(1);
    expect(errorRegistrado(spy)).toMatchObject({ codigo: 'ARGUMENTO_FALTANTE' });
  });

  it('con una entrega desconocida registra el error y devuelve 1', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await ejecutar(['node', 'index.js', 'submission7'], {})).toBe(1);

    expect(errorRegistrado(spy)).toMatchObject({ codigo: 'ENTREGA_DESCONOCIDA', message: 'Entrega desconocida: submission7' });
  });

  it('rechaza la clave con espacios', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(await ejecutar(['node', 'index.js', ' submission1 '], {})).toBe(1);

    expect(errorRegistrado(spy)).toMatchObject({ codigo: 'ENTREGA_DESCONOCIDA' });
  });

  it('genera el reporte en el directorio de invocacion y devuelve 0', async () => {
    raiz = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
    const trabajo = path.join(raiz, 'evalx');
    await fs.mkdir(path.join(raiz, '_project', 'GCGProject_VK'), { recursive: true });
    await fs.mkdir(path.join(trabajo, 'GCG_VK'), { recursive: true });
    await crearPng(path.join(trabajo, 'standard_front.png'), [1, 2, 3], 1, 1);
    await crearPng(path.join(trabajo, 'GCG_VK', 'standard_front.png'), [1, 2, 3], 1, 1);

    expect(await ejecutar(['node', 'index.js', 'submission1'], { INIT_CWD: trabajo })).toBe(0);

    const contenido = await fs.readFile(path.join(trabajo, 'report.tex'), 'utf8');
    expect(contenido).toContain('\\includegraphics[width=0.3\\textwidth]{GCG_VK/standard_front.png}\n');
    await expect(fs.access(path.join(trabajo, 'diff_standard_front.png'))).resolves.toBeUndefined();
  });
});
