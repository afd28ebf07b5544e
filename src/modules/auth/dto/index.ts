export * from './login.dto';
export * from './register.dto';
