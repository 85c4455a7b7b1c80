import { createProgram } from "./compile";
import { shapeVertexShader, shapeFragmentShader } from "./shape";

export interface ShapeProgramInfo {
  program: WebGLProgram;
  uniforms: {
    matrix: WebGLUniformLocation;
    texture: WebGLUniformLocation;
    useTexture: WebGLUniformLocation;
  };
  attribs: {
    position: number;
    texcoord: number;
    color: number;
  };
}

function getUniform(
  gl: WebGL2RenderingContext,
  program: WebGLProgram,
  name: string
): WebGLUniformLocation {
  const location = gl.getUniformLocation(program, name);
  if (!location) {
    throw new Error(`Uniform not found: ${name}`);
  }
  return location;
}

export function createShapeProgramInfo(
  gl: WebGL2RenderingContext
): ShapeProgramInfo {
  const program = createProgram(gl, shapeVertexShader, shapeFragmentShader);

  return {
    program,
    uniforms: {
      matrix: getUniform(gl, program, "u_matrix"),
      texture: getUniform(gl, program, "u_texture"),
      useTexture: getUniform(gl, program, "u_useTexture"),
    },
    attribs: {
      position: gl.getAttribLocation(program, "a_position"),
      texcoord: gl.getAttribLocation(program, "a_texcoord"),
      color: gl.getAttribLocation(program, "a_color"),
    },
  };
}
