import { join } from 'node:path'
import type { ExecutableHandle, WorkloadSpec } from '../core/types'
import { SourceEnvironment, type BuildStep } from './environment'

export class CEnvironment extends SourceEnvironment {
  readonly id: string = 'c'
  readonly aliases: readonly string[] = ['c']
  readonly toolchain: readonly string[] = ['gcc']
  protected readonly sourceFile: string = 'main.c'
  protected readonly compiler: string = 'gcc'

  protected buildSteps(spec: WorkloadSpec, workdir: string): BuildStep[] {
    return [
      {
        command: this.compiler,
        argv: [join(workdir, this.sourceFile), '-o', join(workdir, 'main'), ...spec.options],
      },
    ]
  }

  protected executable(_spec: WorkloadSpec, workdir: string): ExecutableHandle {
    return { path: join(workdir, 'main'), argv: [] }
  }
}

export class CppEnvironment extends CEnvironment {
  readonly id = 'cpp'
  readonly aliases = ['c++', 'cpp', 'cplus', 'cplusplus']
  readonly toolchain = ['g++']
  protected readonly sourceFile = 'main.cpp'
  protected readonly compiler = 'g++'
}

export class CSharpEnvironment extends SourceEnvironment {
  readonly id = 'csharp'
  readonly aliases = ['c#', 'cs', 'csharp']
  readonly toolchain = ['dotnet']
  protected readonly sourceFile = 'Program.cs'

  protected projectFiles(): Record<string, string> {
    return {
      'program.csproj': [
        '<Project Sdk="Microsoft.NET.Sdk">',
        '  <PropertyGroup>',
        '    <OutputType>Exe</OutputType>',
        '    <TargetFramework>net9.0</TargetFramework>',
        '    <AssemblyName>program</AssemblyName>',
        '    <Nullable>disable</Nullable>',
        '    <AllowUnsafeBlocks>true</AllowUnsafeBlocks>',
        '  </PropertyGroup>',
        '</Project>',
        '',
      ].join('\n'),
    }
  }

  protected buildSteps(spec: WorkloadSpec, workdir: string): BuildStep[] {
    return [
      {
        command: 'dotnet',
        argv: [
          'build',
          workdir,
          '--nologo',
          '-v',
          'q',
          '-c',
          'Release',
          '-o',
          join(workdir, 'out'),
          '-p:WarningLevel=0',
          '-p:UseSharedCompilation=false',
          ...spec.options,
        ],
      },
    ]
  }

  protected executable(_spec: WorkloadSpec, workdir: string): ExecutableHandle {
    return { path: 'dotnet', argv: [join(workdir, 'out', 'program.dll')] }
  }
}

export class JavaEnvironment extends SourceEnvironment {
  readonly id = 'java'
  readonly aliases = ['java', 'openjdk', 'graalvm', 'semeru']
  readonly toolchain = ['javac', 'java']
  protected readonly sourceFile = 'Program.java'

  protected buildSteps(spec: WorkloadSpec, workdir: string): BuildStep[] {
    return [
      {
        command: 'javac',
        argv: ['-nowarn', '-d', workdir, ...spec.options, join(workdir, this.sourceFile)],
      },
    ]
  }

  protected executable(_spec: WorkloadSpec, workdir: string): ExecutableHandle {
    return { path: 'java', argv: ['--enable-native-access=ALL-UNNAMED', '-cp', workdir, 'Program'] }
  }
}

export class RustEnvironment extends SourceEnvironment {
  readonly id = 'rust'
  readonly aliases = ['rust', 'rs']
  readonly toolchain = ['rustc']
  protected readonly sourceFile = 'main.rs'

  protected buildSteps(spec: WorkloadSpec, workdir: string): BuildStep[] {
    return [
      {
        command: 'rustc',
        argv: [join(workdir, this.sourceFile), '-o', join(workdir, 'main'), ...spec.options],
      },
    ]
  }

  protected executable(_spec: WorkloadSpec, workdir: string): ExecutableHandle {
    return { path: join(workdir, 'main'), argv: [] }
  }
}

/**
 * Interpreted languages: the source is the artifact, options go to the interpreter
 */
export class JavaScriptEnvironment extends SourceEnvironment {
  readonly id = 'javascript'
  readonly aliases = ['javascript', 'js', 'node']
  readonly toolchain = ['node']
  protected readonly sourceFile = 'main.js'

  protected buildSteps(): BuildStep[] {
    return []
  }

  protected executable(spec: WorkloadSpec, workdir: string): ExecutableHandle {
    return { path: 'node', argv: [...spec.options, join(workdir, this.sourceFile)] }
  }
}

export class PythonEnvironment extends SourceEnvironment {
  readonly id = 'python'
  readonly aliases = ['python', 'py']
  readonly toolchain = ['python3']
  protected readonly sourceFile = 'main.py'

  // Byte-compiling surfaces syntax errors as build failures
  protected buildSteps(_spec: WorkloadSpec, workdir: string): BuildStep[] {
    return [{ command: 'python3', argv: ['-m', 'py_compile', join(workdir, this.sourceFile)] }]
  }

  protected executable(spec: WorkloadSpec, workdir: string): ExecutableHandle {
    return { path: 'python3', argv: [...spec.options, join(workdir, this.sourceFile)] }
  }
}

export const builtInEnvironments: SourceEnvironment[] = [
  new CEnvironment(),
  new CppEnvironment(),
  new CSharpEnvironment(),
  new JavaEnvironment(),
  new JavaScriptEnvironment(),
  new PythonEnvironment(),
  new RustEnvironment(),
]
